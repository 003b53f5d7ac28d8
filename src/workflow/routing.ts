import type { Category } from '@/core/types.js';

import type { RouteTarget, SpecialistRoute, WorkflowState } from './types.js';

export const ROUTE_TABLE: Readonly<Record<Category, SpecialistRoute>> = {
  Recruitment: 'recruitment',
  Payroll: 'payroll',
  Benefits: 'benefits',
  Policy: 'policy',
  LeaveManagement: 'leave_management',
  Performance: 'performance',
  General: 'general',
};

/**
 * Picks the stage that follows `check_escalation`.
 * Escalation always wins; an unclassified state or a category outside the
 * table falls back to `general`.
 */
export function resolveRoute(state: WorkflowState): RouteTarget {
  if (state.escalate) return 'escalate';
  const { category } = state;
  if (category === null || !Object.hasOwn(ROUTE_TABLE, category)) return 'general';
  return ROUTE_TABLE[category];
}
