import { ConfigValidationError } from '../errors';
import { validateRange } from '../network/range';
import type { PersistedConfig, ScanFilter, ScanGroup } from '../types';

/**
 * Editable copy of a configuration. Edits stay local until `commit`, which
 * validates everything and hands back a fresh PersistedConfig. Discarding
 * a draft is just dropping it.
 */
export class ConfigDraft {
  private groups: ScanGroup[];
  private results: PersistedConfig['results'];
  private readonly version: number;

  constructor(base: PersistedConfig) {
    this.version = base.version;
    this.groups = base.groups.map((g) => structuredClone(g));
    this.results = structuredClone(base.results);
  }

  get groupNames(): string[] {
    return this.groups.map((g) => g.name);
  }

  getGroup(name: string): ScanGroup | undefined {
    const group = this.groups.find((g) => g.name === name);
    return group ? structuredClone(group) : undefined;
  }

  addGroup(name: string, ranges: string[], filter: ScanFilter = {}): this {
    this.groups.push({ name: name.trim(), ranges: [...ranges], filter: structuredClone(filter), enabled: true });
    return this;
  }

  /** Replace a group. Renaming carries its stored results over to the new name. */
  updateGroup(name: string, next: ScanGroup): this {
    const index = this.indexOf(name);
    this.groups[index] = structuredClone({ ...next, name: next.name.trim() });
    if (next.name.trim() !== name && this.results[name]) {
      this.results[next.name.trim()] = this.results[name];
      delete this.results[name];
    }
    return this;
  }

  removeGroup(name: string): this {
    this.groups.splice(this.indexOf(name), 1);
    delete this.results[name];
    return this;
  }

  setEnabled(name: string, enabled: boolean): this {
    this.groups[this.indexOf(name)].enabled = enabled;
    return this;
  }

  setFilter(name: string, filter: ScanFilter): this {
    this.groups[this.indexOf(name)].filter = structuredClone(filter);
    return this;
  }

  clearResults(name?: string): this {
    if (name === undefined) {
      this.results = {};
    } else {
      delete this.results[name];
    }
    return this;
  }

  /** Validate and produce the new committed configuration. */
  commit(): PersistedConfig {
    const seen = new Set<string>();
    for (const group of this.groups) {
      if (!group.name) throw new ConfigValidationError('Group name is required');
      if (seen.has(group.name)) throw new ConfigValidationError(`Duplicate group name "${group.name}"`, group.name);
      seen.add(group.name);
      if (group.ranges.length === 0) {
        throw new ConfigValidationError(`Group "${group.name}" has no address ranges`, group.name);
      }
      for (const spec of group.ranges) {
        const check = validateRange(spec);
        if (!check.valid) {
          throw new ConfigValidationError(`Group "${group.name}": ${check.error.message}`, group.name, { cause: check.error });
        }
      }
    }

    return {
      version: this.version,
      groups: this.groups.map((g) => structuredClone(g)),
      results: structuredClone(this.results),
    };
  }

  private indexOf(name: string): number {
    const index = this.groups.findIndex((g) => g.name === name);
    if (index === -1) throw new ConfigValidationError(`No group named "${name}"`, name);
    return index;
  }
}
