import type { MetricId } from '../types/records.js';
import type { MetricDefinition } from '../types/reference.js';

/** Page labels differ only in spacing and casing: "Shots  on target" == "Shots On Target". */
export function normalizeLabel(label: string): string {
  return label.replace(/\s+/g, ' ').trim().toLowerCase();
}

/** Closed set of metrics; unknown labels are never turned into new columns. */
export class MetricRegistry {
  private readonly byLabel = new Map<string, MetricDefinition>();

  constructor(readonly definitions: readonly MetricDefinition[]) {
    const ids = new Set<MetricId>();
    for (const def of definitions) {
      const label = normalizeLabel(def.label);
      if (ids.has(def.id) || this.byLabel.has(label)) {
        throw new Error(`Duplicate metric definition: ${def.id} ("${def.label}")`);
      }
      ids.add(def.id);
      this.byLabel.set(label, def);
    }
  }

  lookup(label: string): MetricDefinition | undefined {
    return this.byLabel.get(normalizeLabel(label));
  }

  get ids(): MetricId[] {
    return this.definitions.map((d) => d.id);
  }
}
