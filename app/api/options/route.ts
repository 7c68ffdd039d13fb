import { NextResponse } from "next/server";
import { listPromotionNames } from "@/lib/promotions";
import { DEFAULT_SECTIONS, MAX_SECTIONS, MAX_SOURCE_URLS, MIN_SECTIONS } from "@/lib/request";
import {
  ARTICLE_LANGUAGES,
  ARTICLE_TONES,
  IMAGE_PROVIDERS,
  IMAGE_TONES,
  PROMOTION_STYLES,
} from "@/lib/types";

export async function GET() {
  return NextResponse.json({
    languages: ARTICLE_LANGUAGES,
    tones: ARTICLE_TONES,
    imageTones: IMAGE_TONES,
    imageProviders: IMAGE_PROVIDERS,
    promotions: listPromotionNames(),
    promotionStyles: PROMOTION_STYLES,
    sections: { min: MIN_SECTIONS, max: MAX_SECTIONS, default: DEFAULT_SECTIONS },
    maxSourceUrls: MAX_SOURCE_URLS,
  });
}
