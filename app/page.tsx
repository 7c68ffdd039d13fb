import { getProviderStatus, loadAppConfig } from "@/lib/config";
import { getPromotionSummary, listPromotionNames } from "@/lib/promotions";
import { MAX_SECTIONS, MAX_SOURCE_URLS, MIN_SECTIONS } from "@/lib/request";
import {
  ARTICLE_LANGUAGES,
  ARTICLE_TONES,
  IMAGE_PROVIDERS,
  IMAGE_TONES,
  PROMOTION_STYLES,
} from "@/lib/types";
import StudioClient from "./studio-client";

export const dynamic = "force-dynamic";

export default function StudioPage() {
  return (
    <StudioClient
      options={{
        languages: [...ARTICLE_LANGUAGES],
        tones: [...ARTICLE_TONES],
        imageTones: [...IMAGE_TONES],
        imageProviders: [...IMAGE_PROVIDERS],
        promotions: listPromotionNames(),
        promotionSummaries: Object.fromEntries(
          listPromotionNames().map((name): [string, string] => [name, getPromotionSummary(name)])
        ),
        promotionStyles: [...PROMOTION_STYLES],
        minSections: MIN_SECTIONS,
        maxSections: MAX_SECTIONS,
        maxSourceUrls: MAX_SOURCE_URLS,
      }}
      status={getProviderStatus(loadAppConfig())}
    />
  );
}
