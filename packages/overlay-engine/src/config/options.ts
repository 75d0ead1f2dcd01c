import type { LogLevel } from "@hudlink/event-bus";

export type OverlayEngineOptions = {
  /** Timeout given to a group when it is continued (unfrozen). */
  defaultTimeoutMs?: number;
  minTimeoutMs?: number;
  maxTimeoutMs?: number;
  imageCacheSize?: number;
  maxFontSize?: number;
  /** Substituted for an empty font name on platforms whose default face is unreadable. */
  fallbackFont?: string;
  platform?: NodeJS.Platform;
  argPreviewLength?: number;
  logLevel?: LogLevel;
};

export type ResolvedEngineOptions = Required<OverlayEngineOptions>;

export const DEFAULT_ENGINE_OPTIONS: ResolvedEngineOptions = {
  defaultTimeoutMs: 20000,
  minTimeoutMs: 1,
  maxTimeoutMs: 20000,
  imageCacheSize: 100,
  maxFontSize: 50,
  fallbackFont: "Menlo",
  platform: process.platform,
  argPreviewLength: 180,
  logLevel: "info"
};

export function resolveEngineOptions(options?: OverlayEngineOptions): ResolvedEngineOptions {
  const d = DEFAULT_ENGINE_OPTIONS;
  const minTimeoutMs = Math.max(1, options?.minTimeoutMs ?? d.minTimeoutMs);
  return {
    defaultTimeoutMs: options?.defaultTimeoutMs ?? d.defaultTimeoutMs,
    minTimeoutMs,
    maxTimeoutMs: Math.max(minTimeoutMs, options?.maxTimeoutMs ?? d.maxTimeoutMs),
    imageCacheSize: Math.max(0, options?.imageCacheSize ?? d.imageCacheSize),
    maxFontSize: options?.maxFontSize ?? d.maxFontSize,
    fallbackFont: options?.fallbackFont ?? d.fallbackFont,
    platform: options?.platform ?? d.platform,
    argPreviewLength: options?.argPreviewLength ?? d.argPreviewLength,
    logLevel: options?.logLevel ?? d.logLevel
  };
}
