import { ResourceKind, StateKey } from '../types/index.js';
import { DependencyMissingError } from '../errors/index.js';
import { StateStore } from '../state/state-store.js';

/**
 * The state a pipeline run reads and writes. Under dry run, values recorded
 * by planned steps live only in memory so later steps can resolve them.
 */
export class PipelineState {
  private readonly overlay = new Map<StateKey, string>();
  private recordedInStep: StateKey[] = [];

  constructor(private readonly store: StateStore, readonly dryRun: boolean) {}

  find(key: StateKey): string | undefined {
    return this.overlay.get(key) ?? this.store.find(key);
  }

  require(key: StateKey, kind: ResourceKind): string {
    const value = this.find(key);
    if (value === undefined || value === '') {
      throw new DependencyMissingError(key, kind);
    }
    return value;
  }

  record(key: StateKey, value: string): void {
    this.store.put(key, value);
    if (this.dryRun) {
      this.overlay.set(key, value);
    }
    this.recordedInStep.push(key);
  }

  remove(...keys: StateKey[]): void {
    for (const key of keys) {
      this.overlay.delete(key);
    }
    this.store.remove(...keys);
  }

  beginStep(): void {
    this.recordedInStep = [];
  }

  /** Keys written since the current step began */
  recordedKeys(): StateKey[] {
    return [...this.recordedInStep];
  }
}
