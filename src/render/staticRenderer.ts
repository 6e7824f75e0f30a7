import { TransportError } from "../core/errors";
import type { Renderer } from "./types";

/** Serves content that is already in memory, such as the pages of a parsed document. */
export class StaticRenderer implements Renderer {
  private readonly pages: Map<string, string>;

  constructor(pages: Record<string, string>) {
    this.pages = new Map(Object.entries(pages));
  }

  async open(location: string): Promise<string> {
    const content = this.pages.get(location);
    if (content === undefined) {
      throw new TransportError(`No content for ${location}`);
    }
    return content;
  }

  async close(): Promise<void> {
    return;
  }
}
