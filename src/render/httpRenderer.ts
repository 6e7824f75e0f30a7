import { fetch as undiciFetch, type Dispatcher } from "undici";
import { createDispatcher } from "../core/fetch";
import { TransportError } from "../core/errors";
import type { Renderer } from "./types";

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    dispatcher?: Dispatcher;
    signal: AbortSignal;
  },
) => Promise<FetchResponseLike>;

export interface HttpRendererOptions {
  userAgent: string;
  timeoutMs: number;
  ignoreHttpsErrors: boolean;
  fetchFn?: FetchLike;
}

export class HttpRenderer implements Renderer {
  private readonly options: HttpRendererOptions;
  private readonly fetchFn: FetchLike;
  private dispatcher: Dispatcher | undefined;
  private closed = false;

  constructor(options: HttpRendererOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? undiciFetch;
  }

  async open(location: string): Promise<string> {
    if (this.closed) {
      throw new Error("Renderer session is closed");
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchFn(location, {
        method: "GET",
        headers: {
          "user-agent": this.options.userAgent,
          accept: "text/html,application/xhtml+xml",
        },
        dispatcher: this.getDispatcher(),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new TransportError(`HTTP ${response.status} while fetching ${location}`);
      }

      return await response.text();
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new TransportError(`Timed out after ${this.options.timeoutMs}ms while fetching ${location}`, error);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Request failed for ${location}: ${message}`, error);
    } finally {
      clearTimeout(timeout);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    const dispatcher = this.dispatcher;
    this.dispatcher = undefined;
    if (dispatcher) {
      await dispatcher.close();
    }
  }

  private getDispatcher(): Dispatcher {
    if (!this.dispatcher) {
      this.dispatcher = createDispatcher({ ignoreHttpsErrors: this.options.ignoreHttpsErrors });
    }
    return this.dispatcher;
  }
}
