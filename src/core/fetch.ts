import { Agent } from "undici";

export interface DispatcherOptions {
  ignoreHttpsErrors: boolean;
  connections?: number;
}

/** Each renderer session owns its own agent, so connection pools are never shared across workers. */
export function createDispatcher(options: DispatcherOptions): Agent {
  return new Agent({
    connections: options.connections ?? 2,
    connect: {
      rejectUnauthorized: !options.ignoreHttpsErrors,
    },
  });
}
