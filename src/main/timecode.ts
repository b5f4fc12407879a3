import padStart from 'lodash/padStart.js';

import type { ExtractionWarning, FrameRate } from '../common/types.js';
import type { ExtractorConfig } from './config.js';


/** Whole frames are what the editor shows, so ticks are snapped to the nearest frame first */
export const ticksToSeconds = (ticks: number, { ticksPerFrame, fps }: Pick<FrameRate, 'ticksPerFrame' | 'fps'>) => Math.round(ticks / ticksPerFrame) / fps;

/** `HH:MM:SS`, rounded to the nearest whole second */
export function secondsToTimecode(seconds: number) {
  const rounded = Math.round(seconds);
  const sign = rounded < 0 ? '-' : '';
  const abs = Math.abs(rounded);
  const hours = Math.floor(abs / 3600);
  const minutes = Math.floor((abs % 3600) / 60);
  const secs = abs % 60;
  return `${sign}${padStart(String(hours), 2, '0')}:${padStart(String(minutes), 2, '0')}:${padStart(String(secs), 2, '0')}`;
}

export function timecodeToSeconds(timecode: string) {
  const match = timecode.trim().match(/^(-?)(\d+):(\d{1,2}):(\d{1,2})$/);
  if (!match) return undefined;
  const hours = parseInt(match[2]!, 10);
  const minutes = parseInt(match[3]!, 10);
  const seconds = parseInt(match[4]!, 10);
  if (minutes > 59 || seconds > 59) return undefined;
  const total = (hours * 60 + minutes) * 60 + seconds;
  return match[1] === '-' ? -total : total;
}

const roundFps = (fps: number) => Math.round(fps * 1000) / 1000;

// Some projects store the value scaled, so try dividing it down too
export function lookupCommonFrameRate(rawValue: number, commonFrameRates: ExtractorConfig['commonFrameRates']) {
  const direct = commonFrameRates[String(rawValue)];
  if (direct != null) return direct;
  for (let value = rawValue; value > 1e6; value = Math.floor(value / 10)) {
    const scaled = commonFrameRates[String(value)];
    if (scaled != null) return scaled;
  }
  return undefined;
}

/**
 * Turns the sequence's raw FrameRate value (ticks per frame) into a usable rate.
 * Never fails: a missing or unusable value gives the configured default rate and a warning.
 */
export function resolveFrameRate({ rawTicksPerFrame, config, fpsOverride, sequenceName }: {
  rawTicksPerFrame: number | undefined,
  config: ExtractorConfig,
  fpsOverride?: number | undefined,
  sequenceName?: string | undefined,
}): { frameRate: FrameRate, warnings: ExtractionWarning[] } {
  const warnings: ExtractionWarning[] = [];
  const label = sequenceName != null ? `sequence '${sequenceName}'` : 'sequence';

  const fallbackFps = fpsOverride ?? config.defaultFps;
  const fallback = (): FrameRate => ({ ticksPerFrame: config.ticksPerSecond / fallbackFps, fps: fallbackFps, nominalFps: roundFps(fallbackFps), isFallback: true });

  if (rawTicksPerFrame == null || !Number.isFinite(rawTicksPerFrame) || rawTicksPerFrame <= 0) {
    warnings.push({ code: 'frame-rate-fallback', message: `FrameRate for ${label} was not found, using ${fallbackFps} fps` });
    return { frameRate: fallback(), warnings };
  }

  const common = lookupCommonFrameRate(rawTicksPerFrame, config.commonFrameRates);
  const exactFps = config.ticksPerSecond / rawTicksPerFrame;

  let frameRate: FrameRate;
  if (common != null) {
    frameRate = { ticksPerFrame: rawTicksPerFrame, fps: common, nominalFps: common, isFallback: false };
  } else if (exactFps > 0 && exactFps <= 1000) {
    frameRate = { ticksPerFrame: rawTicksPerFrame, fps: exactFps, nominalFps: roundFps(exactFps), isFallback: false };
  } else {
    warnings.push({ code: 'unrecognized-frame-rate', message: `Unrecognized FrameRate value ${rawTicksPerFrame} for ${label}, using ${fallbackFps} fps` });
    return { frameRate: fallback(), warnings };
  }

  if (fpsOverride != null) {
    return { frameRate: { ...frameRate, fps: fpsOverride, nominalFps: roundFps(fpsOverride) }, warnings };
  }
  return { frameRate, warnings };
}
