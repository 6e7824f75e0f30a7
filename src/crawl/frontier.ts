export function normalizeLocation(location: string): string {
  const trimmed = location.trim();
  if (!/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }

  try {
    const url = new URL(trimmed);
    url.hash = "";
    if (url.pathname.length > 1 && url.pathname.endsWith("/")) {
      url.pathname = url.pathname.replace(/\/+$/, "");
    }
    return url.toString();
  } catch {
    return trimmed;
  }
}

/**
 * Discovered locations for one run, in discovery order. A location that has been added or
 * visited once is excluded from every later discovery pass.
 */
export class Frontier {
  private readonly known = new Set<string>();
  private readonly visited = new Set<string>();
  private readonly ordered: string[] = [];

  /** Returns false when the location was already known. */
  add(location: string): boolean {
    const normalized = normalizeLocation(location);
    if (this.known.has(normalized)) {
      return false;
    }
    this.known.add(normalized);
    this.ordered.push(normalized);
    return true;
  }

  has(location: string): boolean {
    return this.known.has(normalizeLocation(location));
  }

  /** Returns false when the location had already been visited. */
  markVisited(location: string): boolean {
    const normalized = normalizeLocation(location);
    this.known.add(normalized);
    if (this.visited.has(normalized)) {
      return false;
    }
    this.visited.add(normalized);
    return true;
  }

  isVisited(location: string): boolean {
    return this.visited.has(normalizeLocation(location));
  }

  locations(): string[] {
    return [...this.ordered];
  }

  get size(): number {
    return this.ordered.length;
  }

  get visitedCount(): number {
    return this.visited.size;
  }
}
