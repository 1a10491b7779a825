import type { DatasetEnvelope, DatasetRecord } from './types';

export type EnvelopeCheck =
  | { ok: true; envelope: DatasetEnvelope }
  | { ok: false; rule: string; reason: string };

interface EnvelopeRule {
  name: string;
  reason: string;
  holds(body: Record<string, unknown>): boolean;
}

type RecordEnvelope = Record<string, unknown> & DatasetEnvelope;

function hasRecordDataset(body: Record<string, unknown>): body is RecordEnvelope {
  return isRecordList(body.dataset);
}

const RECORD_LIST_RULE: EnvelopeRule = {
  name: 'dataset-is-record-list',
  reason: 'Query indicates success, but the dataset is not a list of records',
  holds: hasRecordDataset,
};

/**
 * Applied in order; the first failing rule decides the reason.
 *
 * An empty dataset counts as a failure: the API answers a query that matches
 * no trade records with an empty dataset, and callers get an error for it
 * rather than a zero-row result.
 */
export const DATASET_ENVELOPE_RULES: readonly EnvelopeRule[] = [
  {
    name: 'has-validation',
    reason: "Query indicates success, but doesn't contain validation",
    holds: (body) => 'validation' in body,
  },
  {
    name: 'has-dataset',
    reason: "Query indicates success, but doesn't contain dataset",
    holds: (body) => 'dataset' in body,
  },
  {
    name: 'dataset-not-empty',
    reason: 'Query indicates success, but the dataset is empty',
    holds: (body) => !isEmptyValue(body.dataset),
  },
  RECORD_LIST_RULE,
];

export function checkDatasetEnvelope(body: unknown): EnvelopeCheck {
  if (!isRecord(body)) {
    return {
      ok: false,
      rule: 'is-object',
      reason: 'Query indicates success, but the response is not a JSON object',
    };
  }

  const failed = firstFailedRule(body);
  if (failed || !hasRecordDataset(body)) {
    const rule = failed ?? RECORD_LIST_RULE;
    return { ok: false, rule: rule.name, reason: rule.reason };
  }
  return { ok: true, envelope: { validation: body.validation, dataset: body.dataset } };
}

function firstFailedRule(body: Record<string, unknown>): EnvelopeRule | undefined {
  return DATASET_ENVELOPE_RULES.find((rule) => !rule.holds(body));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRecordList(value: unknown): value is DatasetRecord[] {
  return Array.isArray(value) && value.every(isRecord);
}

function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined || value === '' || value === false || value === 0) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return isRecord(value) && Object.keys(value).length === 0;
}
