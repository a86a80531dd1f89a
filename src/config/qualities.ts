/**
 * Quality Presets
 * Fixed format-selection expressions handed to the downloader's -f flag.
 */

export const QUALITY_SELECTORS = ["best", "high1080p", "medium720p", "low480p", "audioOnly"] as const;

export type QualitySelector = (typeof QUALITY_SELECTORS)[number];

export interface QualityPreset {
  label: string;
  format: string;
}

export const qualityPresets: Readonly<Record<QualitySelector, QualityPreset>> = {
  best: {
    label: "Best Quality",
    format: "bestvideo+bestaudio/best",
  },
  high1080p: {
    label: "1080p (Full HD)",
    format: "bestvideo[height<=1080]+bestaudio/best[height<=1080]",
  },
  medium720p: {
    label: "720p (HD)",
    format: "bestvideo[height<=720]+bestaudio/best[height<=720]",
  },
  low480p: {
    label: "480p (SD)",
    format: "bestvideo[height<=480]+bestaudio/best[height<=480]",
  },
  audioOnly: {
    label: "Audio Only",
    format: "bestaudio/best",
  },
};

export function formatExpression(quality: QualitySelector): string {
  return qualityPresets[quality].format;
}
