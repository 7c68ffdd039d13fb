import type { ImageProviderName } from "./config";
import type { ImageResult } from "./types";

export interface ImageStats {
  total: number;
  generated: number;
  placeholders: number;
  /** Percentage, one decimal. */
  successRate: number;
  providers: ImageProviderName[];
}

export function summarizeImages(images: ImageResult[]): ImageStats {
  const generated = images.filter((image) => !image.isPlaceholder).length;
  return {
    total: images.length,
    generated,
    placeholders: images.length - generated,
    successRate: images.length > 0 ? Math.round((generated / images.length) * 1000) / 10 : 0,
    providers: [...new Set(images.map((image) => image.provider))],
  };
}
