// --------------------
// Records & roles
// --------------------
export type CellValue = string | number | Date | null;

// One shipment row. Field set is discovered per dataset.
export type ShipmentRecord = Record<string, CellValue>;

export type FieldRole =
  | 'numeric'
  | 'date'
  | 'identifier'
  | 'text';

export interface KnownField {
  name: string;
  role: FieldRole;
}

export interface FieldOverrides {
  dateField?: string;
  costField?: string;
}

// --------------------
// Filters
// --------------------
export type ConditionOp =
  | 'eq'
  | 'in'
  | 'gt' | 'gte' | 'lt' | 'lte'
  | 'contains'; // case-insensitive substring

export type Condition =
  | { field: string; op: 'eq'; value: string | number }
  | { field: string; op: 'in'; value: string[] }
  | { field: string; op: 'gt' | 'gte' | 'lt' | 'lte'; value: number }
  | { field: string; op: 'contains'; value: string };

// Half-open [start, end), start <= end.
export interface DateRange {
  field: string;
  start: Date;
  end: Date;
  phrase: string; // matched text, e.g. "this month"
}

export interface PlanFilter {
  dateRange?: DateRange;
  conditions: Condition[];
}

// --------------------
// QueryPlan
// --------------------
export type AggregateOp = 'sum' | 'avg';
export type GroupOp = AggregateOp | 'count';

export type CountIntent = 'count' | 'listing' | 'unrecognized';

export interface CountPlan {
  kind: 'count';
  intent: CountIntent;
  filter: PlanFilter;
  uniqueBy?: string; // identifier field; executor also reports distinct values
  sample?: number; // listing: also return up to this many matching rows
}

export interface AggregatePlan {
  kind: 'aggregate';
  op: AggregateOp;
  field: string;
  filter: PlanFilter;
}

export interface TopNPlan {
  kind: 'top_n';
  field: string;
  n: number;
  dir: 'desc';
  filter: PlanFilter;
}

export interface GroupedAggregatePlan {
  kind: 'grouped_aggregate';
  groupBy: string;
  op: GroupOp;
  valueField?: string; // absent when op is count
  filter: PlanFilter;
}

export interface DuplicatesPlan {
  kind: 'duplicates';
  field: string;
  limit: number;
  filter: PlanFilter;
}

export type QueryPlan =
  | CountPlan
  | AggregatePlan
  | TopNPlan
  | GroupedAggregatePlan
  | DuplicatesPlan;

export type NoticeCode =
  | 'UNRECOGNIZED_INTENT'
  | 'NO_COST_FIELD'
  | 'NO_DATE_FIELD'
  | 'NO_GROUP_FIELD'
  | 'NO_IDENTIFIER_FIELD';

export interface Notice {
  code: NoticeCode;
  message: string;
}

export interface Translation {
  plan: QueryPlan;
  notices: Notice[];
}

// --------------------
// Execution results
// --------------------
export interface GroupRow {
  key: CellValue;
  value: number;
  count: number;
}

export type ExecutionResult =
  | { kind: 'scalar'; value: number | null; unique?: number; rows?: ShipmentRecord[] }
  | { kind: 'rows'; rows: ShipmentRecord[] }
  | { kind: 'groups'; groups: GroupRow[] };

// --------------------
// Store (executor seam)
// --------------------
export interface InsertSummary {
  insertedCount: number;
}

export interface ShipmentStore {
  name: string;
  insertMany(docs: ShipmentRecord[]): Promise<InsertSummary>;
  ensureIndexes(fields: string[]): Promise<string[]>;
  sample(limit: number): Promise<ShipmentRecord[]>;
  execute(plan: QueryPlan): Promise<ExecutionResult>;
  health(): Promise<{ ok: boolean; error?: string }>;
  close(): Promise<void>;
}

// Subset of pino's BaseLogger; Fastify's request logger satisfies it.
export interface Logger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
  debug(obj: object, msg?: string): void;
}
