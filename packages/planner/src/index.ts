// packages/planner/src/index.ts
// Rule-based question -> QueryPlan translator. Filter extraction runs first and
// independently; intent rules then pick exactly one plan shape (first match wins).
import type {
  Condition, FieldOverrides, KnownField, Notice, PlanFilter, Translation
} from '@shipquery/core';
import { Notices } from '@shipquery/core';
import { detectCostField, detectDateField, detectIdentifierField } from '@shipquery/catalog';
import { extractDateWindow } from './dates';
import { extractPlaces, extractStatus, extractThresholds } from './conditions';
import { INTENT_RULES, type RuleContext } from './rules';

export { extractDateWindow, MAX_LOOKBACK_DAYS, type DateWindow } from './dates';
export { extractPlaces, extractStatus, extractThresholds, STATUS_WORDS } from './conditions';
export { INTENT_RULES, DEFAULT_TOP_N, DUPLICATE_LIMIT, LISTING_SAMPLE, type IntentRule, type RuleContext } from './rules';

export interface TranslateOptions {
  now?: Date;
}

function buildFilter(
  text: string,
  fields: readonly KnownField[],
  overrides: FieldOverrides,
  costField: string | undefined,
  now: Date,
  notices: Notice[]
): PlanFilter {
  const conditions: Condition[] = [
    ...extractStatus(text, fields),
    ...extractPlaces(text, fields),
    ...extractThresholds(text, fields, costField),
  ];

  const window = extractDateWindow(text, now);
  if (!window) return { conditions };

  const dateField = detectDateField(fields, overrides);
  if (!dateField) {
    notices.push(Notices.NO_DATE_FIELD(window.phrase));
    return { conditions };
  }
  return { dateRange: { field: dateField, ...window }, conditions };
}

export function translate(
  question: string,
  knownFields: readonly KnownField[],
  overrides: FieldOverrides = {},
  opts: TranslateOptions = {}
): Translation {
  const text = (question || '').trim();
  const now = opts.now ?? new Date();
  const notices: Notice[] = [];

  const costField = detectCostField(knownFields, overrides);
  const ctx: RuleContext = {
    text,
    fields: knownFields,
    filter: buildFilter(text, knownFields, overrides, costField, now, notices),
    costField,
    identifierField: detectIdentifierField(knownFields),
    notices,
  };

  for (const rule of INTENT_RULES) {
    const plan = rule.apply(ctx);
    if (plan) return { plan, notices };
  }
  // fallbackRule always returns a plan
  throw new Error('translate: no intent rule produced a plan');
}
