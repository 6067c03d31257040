import type { StatsData } from '../types/messages.js';

/** Anything with writable text. A DOM element satisfies this. */
export interface DisplayElement {
  textContent: string | null;
}

export type DisplayRole = 'user-count';

/**
 * Registry of on-page elements that live updates write into: elements bound
 * to a stat key, and elements bound to a role such as the live user count.
 */
export class DisplayBoard {
  private readonly stats = new Map<string, Set<DisplayElement>>();
  private readonly roles = new Map<DisplayRole, Set<DisplayElement>>();

  bindStat(key: string, element: DisplayElement): () => void {
    return bind(this.stats, key, element);
  }

  bindRole(role: DisplayRole, element: DisplayElement): () => void {
    return bind(this.roles, role, element);
  }

  /** Write each value into the elements bound to its key. Unbound keys are ignored. Returns the number of elements written. */
  applyStats(data: StatsData): number {
    let written = 0;
    for (const [key, value] of Object.entries(data)) {
      const elements = this.stats.get(key);
      if (!elements) continue;
      for (const element of elements) {
        element.textContent = String(value);
        written++;
      }
    }
    return written;
  }

  applyUserCount(count: number | string): number {
    const elements = this.roles.get('user-count');
    if (!elements) return 0;
    for (const element of elements) {
      element.textContent = String(count);
    }
    return elements.size;
  }
}

function bind<K>(registry: Map<K, Set<DisplayElement>>, key: K, element: DisplayElement): () => void {
  let elements = registry.get(key);
  if (!elements) {
    elements = new Set();
    registry.set(key, elements);
  }
  elements.add(element);

  return () => {
    const current = registry.get(key);
    if (!current) return;
    current.delete(element);
    if (current.size === 0) registry.delete(key);
  };
}
