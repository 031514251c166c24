import type { PlanItem, PlanStore } from '@toolpilot/core';

/** Plan state held in memory. Reads return copies. */
export class MemoryPlanStore implements PlanStore {
  private items: PlanItem[] = [];

  get(): PlanItem[] {
    return this.items.map((item) => ({ ...item }));
  }

  replace(items: PlanItem[]): void {
    this.items = items.map((item) => ({ ...item }));
  }
}
