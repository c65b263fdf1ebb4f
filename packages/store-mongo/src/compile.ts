// packages/store-mongo/src/compile.ts
// QueryPlan -> aggregation pipeline. Pure; no driver calls.
import type { Document } from 'mongodb';
import type { Condition, CountPlan, PlanFilter, QueryPlan } from '@shipquery/core';

// numeric view of a cell; text like "n/a" and nulls count as 0
export const toDouble = (field: string): Document => ({
  $convert: { input: `$${field}`, to: 'double', onError: 0, onNull: 0 }
});

const esc = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

function conditionToMongo(c: Condition): Document {
  switch (c.op) {
    case 'eq': return { [c.field]: c.value };
    case 'in': return { [c.field]: { $in: c.value.map((v) => new RegExp(`^${esc(v)}$`, 'i')) } };
    case 'gt': return { [c.field]: { $gt: c.value } };
    case 'gte': return { [c.field]: { $gte: c.value } };
    case 'lt': return { [c.field]: { $lt: c.value } };
    case 'lte': return { [c.field]: { $lte: c.value } };
    case 'contains': return { [c.field]: { $regex: esc(c.value), $options: 'i' } };
  }
}

export function buildMatch(filter: PlanFilter): Document {
  const clauses: Document[] = [];
  if (filter.dateRange) {
    const { field, start, end } = filter.dateRange;
    clauses.push({ [field]: { $gte: start, $lt: end } });
  }
  clauses.push(...filter.conditions.map(conditionToMongo));

  if (!clauses.length) return {};
  return clauses.length === 1 ? clauses[0] : { $and: clauses };
}

export const SORT_KEY = '__sort_value';

/** Matching rows for a listing plan; empty when the plan asks for none. */
export function compileSample(plan: CountPlan): Document[] {
  if (!plan.sample) return [];
  return [{ $match: buildMatch(plan.filter) }, { $limit: plan.sample }, { $project: { _id: 0 } }];
}

export function compilePlan(plan: QueryPlan): Document[] {
  const pipeline: Document[] = [{ $match: buildMatch(plan.filter) }];

  switch (plan.kind) {
    case 'count': {
      const group: Document = { _id: null, total: { $sum: 1 } };
      if (plan.uniqueBy) group.ids = { $addToSet: `$${plan.uniqueBy}` };
      pipeline.push({ $group: group });
      pipeline.push({
        $project: plan.uniqueBy
          ? { _id: 0, total: 1, unique: { $size: { $setDifference: ['$ids', [null, '']] } } }
          : { _id: 0, total: 1 }
      });
      return pipeline;
    }

    case 'aggregate': {
      const acc = plan.op === 'sum' ? '$sum' : '$avg';
      pipeline.push({ $group: { _id: null, value: { [acc]: toDouble(plan.field) } } });
      pipeline.push({ $project: { _id: 0, value: 1 } });
      return pipeline;
    }

    case 'top_n':
      pipeline.push(
        { $addFields: { [SORT_KEY]: toDouble(plan.field) } },
        { $sort: { [SORT_KEY]: -1 } },
        { $limit: plan.n },
        { $project: { _id: 0, [SORT_KEY]: 0 } }
      );
      return pipeline;

    case 'grouped_aggregate': {
      const value =
        plan.op === 'count' || !plan.valueField
          ? { $sum: 1 }
          : { [plan.op === 'sum' ? '$sum' : '$avg']: toDouble(plan.valueField) };
      pipeline.push(
        { $group: { _id: `$${plan.groupBy}`, value, count: { $sum: 1 } } },
        { $sort: { value: -1, _id: 1 } },
        { $project: { _id: 0, key: '$_id', value: 1, count: 1 } }
      );
      return pipeline;
    }

    case 'duplicates':
      pipeline.push(
        { $match: { [plan.field]: { $nin: [null, ''] } } },
        { $group: { _id: `$${plan.field}`, count: { $sum: 1 } } },
        { $match: { count: { $gt: 1 } } },
        { $sort: { count: -1, _id: 1 } },
        { $limit: plan.limit },
        { $project: { _id: 0, key: '$_id', value: '$count', count: 1 } }
      );
      return pipeline;
  }
}
