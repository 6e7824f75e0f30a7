/** One rendering session. Never shared between workers. */
export interface Renderer {
  open(location: string): Promise<string>;
  close(): Promise<void>;
}

export type RendererFactory = () => Renderer;
