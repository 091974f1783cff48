/**
 * Status conditions.
 *
 * On the wire conditions are an ordered list. In memory they are a map keyed
 * by condition type, so there is never more than one condition of a type.
 */

import { type } from 'arktype';
import { formatRfc3339, parseRfc3339 } from '../../core/utils/time.js';

export const ConditionResourceSchema = type({
  type: 'string',
  status: "'True' | 'False' | 'Unknown'",
  'reason?': 'string',
  'message?': 'string',
  'lastTransitionTime?': 'string',
  'observedGeneration?': 'number',
});

export type ConditionResource = typeof ConditionResourceSchema.infer;

export type ConditionStatus = ConditionResource['status'];

export interface Condition {
  type: string;
  status: ConditionStatus;
  reason: string;
  message: string;
  lastTransitionTime: Date;
  observedGeneration?: number;
}

export type ConditionInput = Omit<Condition, 'lastTransitionTime'> & { lastTransitionTime?: Date };

export class ConditionSet {
  private readonly byType = new Map<string, Condition>();

  static fromResource(conditions: readonly ConditionResource[] | undefined): ConditionSet {
    const set = new ConditionSet();
    for (const condition of conditions ?? []) {
      set.byType.set(condition.type, {
        type: condition.type,
        status: condition.status,
        reason: condition.reason ?? '',
        message: condition.message ?? '',
        lastTransitionTime: parseRfc3339(condition.lastTransitionTime) ?? new Date(0),
        ...(condition.observedGeneration !== undefined && {
          observedGeneration: condition.observedGeneration,
        }),
      });
    }
    return set;
  }

  get size(): number {
    return this.byType.size;
  }

  get(conditionType: string): Condition | undefined {
    return this.byType.get(conditionType);
  }

  has(conditionType: string): boolean {
    return this.byType.has(conditionType);
  }

  /**
   * Add or update the condition of `condition.type`.
   *
   * `lastTransitionTime` only moves when the status changes. Returns whether
   * anything changed.
   */
  set(condition: ConditionInput, now: Date = new Date()): boolean {
    const existing = this.byType.get(condition.type);

    if (!existing) {
      this.byType.set(condition.type, {
        ...condition,
        lastTransitionTime: condition.lastTransitionTime ?? now,
      });
      return true;
    }

    let changed = false;
    if (existing.status !== condition.status) {
      existing.status = condition.status;
      existing.lastTransitionTime = condition.lastTransitionTime ?? now;
      changed = true;
    }
    if (existing.reason !== condition.reason) {
      existing.reason = condition.reason;
      changed = true;
    }
    if (existing.message !== condition.message) {
      existing.message = condition.message;
      changed = true;
    }
    if (existing.observedGeneration !== condition.observedGeneration) {
      existing.observedGeneration = condition.observedGeneration;
      changed = true;
    }
    return changed;
  }

  /**
   * Remove the condition of a type. Returns whether one was present.
   */
  remove(conditionType: string): boolean {
    return this.byType.delete(conditionType);
  }

  toList(): Condition[] {
    return [...this.byType.values()].map((condition) => ({ ...condition }));
  }

  toResource(): ConditionResource[] {
    return this.toList().map((condition) => ({
      type: condition.type,
      status: condition.status,
      reason: condition.reason,
      message: condition.message,
      lastTransitionTime: formatRfc3339(condition.lastTransitionTime),
      ...(condition.observedGeneration !== undefined && {
        observedGeneration: condition.observedGeneration,
      }),
    }));
  }

  clone(): ConditionSet {
    const copy = new ConditionSet();
    for (const condition of this.byType.values()) {
      copy.byType.set(condition.type, { ...condition });
    }
    return copy;
  }
}
