import type { AppConfig } from "../config";
import { HttpRenderer } from "./httpRenderer";
import type { RendererFactory } from "./types";

export function createHttpRendererFactory(config: AppConfig): RendererFactory {
  return () =>
    new HttpRenderer({
      userAgent: config.userAgent,
      timeoutMs: config.requestTimeoutMs,
      ignoreHttpsErrors: config.ignoreHttpsErrors,
    });
}

export * from "./httpRenderer";
export * from "./staticRenderer";
export * from "./types";
