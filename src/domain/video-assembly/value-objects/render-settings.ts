export interface Resolution {
  readonly width: number;
  readonly height: number;
}

export interface RenderSettings {
  readonly resolution: Resolution;
  readonly opacity: number;
  readonly backgroundAudioVolume: number;
  readonly screenshotWidthPercent: number;
}

export interface BackgroundCredit {
  readonly text: string;
  readonly fontFile: string;
  readonly fontSize: number;
  readonly fontColor: string;
}

export interface EncoderParameters {
  readonly videoCodec: string;
  readonly videoBitrate: string;
  readonly audioBitrate: string;
  readonly threads: number;
  readonly format: 'mp4';
}

export const DEFAULT_SCREENSHOT_WIDTH_PERCENT = 45;

export function screenshotWidth(settings: RenderSettings): number {
  return Math.floor((settings.resolution.width * settings.screenshotWidthPercent) / 100);
}
