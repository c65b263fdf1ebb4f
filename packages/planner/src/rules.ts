// packages/planner/src/rules.ts
// Intent rules, evaluated in order; the first rule returning a plan wins.
import type { KnownField, Notice, PlanFilter, QueryPlan } from '@shipquery/core';
import { Notices } from '@shipquery/core';
import { resolveFieldToken } from '@shipquery/catalog';

export interface RuleContext {
  text: string;
  fields: readonly KnownField[];
  filter: PlanFilter;
  costField?: string;
  identifierField?: string;
  notices: Notice[];
}

export interface IntentRule {
  name: string;
  apply(ctx: RuleContext): QueryPlan | null;
}

export const DEFAULT_TOP_N = 5;
export const MAX_TOP_N = 1000;
export const DUPLICATE_LIMIT = 10;
export const LISTING_SAMPLE = 100;

const GROUP_RE = /\b(?:group(?:ed)?\s+by|breakdown\s+by|break\s+down\s+by|broken\s+down\s+by)\s+([a-z0-9 _#/-]+)/i;
const TOP_RE = /\b(?:top|highest|most\s+expensive|costliest|priciest)\b/i;
const AVG_RE = /\b(?:average|avg|mean)\b/i;
const SUM_RE = /\b(?:total|sum)\b/i;
const COST_NOUN_RE = /\b(?:costs?|amounts?|charges?|prices?|spend(?:ing)?|freight|value)\b/i;
const COUNT_RE = /\bhow\s+many\b|\bcount\b|\bnumber\s+of\b/i;
const DUPLICATE_RE = /\bduplicat(?:e|es|ed)\b/i;

const note = (ctx: RuleContext, n: Notice) => {
  if (!ctx.notices.some((x) => x.code === n.code)) ctx.notices.push(n);
};

// strict match over word prefixes (longest first), then loose
function resolveGroupToken(fields: readonly KnownField[], phrase: string): string | undefined {
  const words = phrase.trim().split(/\s+/).slice(0, 4);
  for (const loose of [false, true]) {
    for (let k = words.length; k > 0; k--) {
      const hit = resolveFieldToken(fields, words.slice(0, k).join(' '), { loose });
      if (hit) return hit;
    }
  }
  return undefined;
}

function topN(text: string): number {
  const m = text.match(/\b(?:top|highest)\s+(\d+)\b/i) ?? text.match(/\b(\d+)\s+(?:most\s+expensive|highest|costliest|priciest)\b/i);
  if (!m) return DEFAULT_TOP_N;
  return Math.min(Math.max(Number(m[1]), 1), MAX_TOP_N);
}

export const duplicatesRule: IntentRule = {
  name: 'duplicates',
  apply(ctx) {
    if (!DUPLICATE_RE.test(ctx.text)) return null;
    if (!ctx.identifierField) {
      note(ctx, Notices.NO_IDENTIFIER_FIELD());
      return null;
    }
    return { kind: 'duplicates', field: ctx.identifierField, limit: DUPLICATE_LIMIT, filter: ctx.filter };
  }
};

export const groupedRule: IntentRule = {
  name: 'grouped_aggregate',
  apply(ctx) {
    const m = ctx.text.match(GROUP_RE);
    const token = m ? m[1] : /\bby\s+status\b/i.test(ctx.text) ? 'status' : null;
    if (!token) return null;

    const groupBy = resolveGroupToken(ctx.fields, token);
    if (!groupBy) {
      note(ctx, Notices.NO_GROUP_FIELD(token.trim()));
      return null;
    }

    const wanted = AVG_RE.test(ctx.text) ? 'avg' : /\b(?:cost|total|sum)\b/i.test(ctx.text) ? 'sum' : 'count';
    if (wanted !== 'count' && ctx.costField) {
      return { kind: 'grouped_aggregate', groupBy, op: wanted, valueField: ctx.costField, filter: ctx.filter };
    }
    if (wanted !== 'count') note(ctx, Notices.NO_COST_FIELD());
    return { kind: 'grouped_aggregate', groupBy, op: 'count', filter: ctx.filter };
  }
};

export const topNRule: IntentRule = {
  name: 'top_n',
  apply(ctx) {
    if (!TOP_RE.test(ctx.text)) return null;
    if (!ctx.costField) {
      note(ctx, Notices.NO_COST_FIELD());
      return null;
    }
    return { kind: 'top_n', field: ctx.costField, n: topN(ctx.text), dir: 'desc', filter: ctx.filter };
  }
};

export const aggregateRule: IntentRule = {
  name: 'aggregate',
  apply(ctx) {
    const op = AVG_RE.test(ctx.text) ? 'avg' : SUM_RE.test(ctx.text) ? 'sum' : null;
    if (!op || !COST_NOUN_RE.test(ctx.text)) return null;
    if (!ctx.costField) {
      note(ctx, Notices.NO_COST_FIELD());
      return null;
    }
    return { kind: 'aggregate', op, field: ctx.costField, filter: ctx.filter };
  }
};

export const countRule: IntentRule = {
  name: 'count',
  apply(ctx) {
    if (!COUNT_RE.test(ctx.text)) return null;
    return { kind: 'count', intent: 'count', filter: ctx.filter, ...(ctx.identifierField ? { uniqueBy: ctx.identifierField } : {}) };
  }
};

// Always matches. A filter alone lists the matching shipments; an empty
// filter means nothing in the question was understood.
export const fallbackRule: IntentRule = {
  name: 'fallback',
  apply(ctx) {
    const understood = !!ctx.filter.dateRange || ctx.filter.conditions.length > 0;
    if (!understood) note(ctx, Notices.UNRECOGNIZED_INTENT());
    return {
      kind: 'count',
      intent: understood ? 'listing' : 'unrecognized',
      filter: ctx.filter,
      ...(ctx.identifierField ? { uniqueBy: ctx.identifierField } : {}),
      ...(understood ? { sample: LISTING_SAMPLE } : {})
    };
  }
};

export const INTENT_RULES: readonly IntentRule[] = [
  duplicatesRule,
  groupedRule,
  topNRule,
  aggregateRule,
  countRule,
  fallbackRule,
];
