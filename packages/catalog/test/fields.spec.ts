/* packages/catalog/test/fields.spec.ts */
import { describe, it, expect } from 'vitest';
import type { KnownField } from '@shipquery/core';
import {
  describeFields, detectCostField, detectDateField,
  detectIdentifierField, detectStatusField, resolveFieldToken
} from '../src';

describe('describeFields', () => {
  it('classifies every key except _id in first-seen order', () => {
    const fields = describeFields([
      { _id: 'a', RefNo: 'A1', Cost: 10, ShipDate: new Date(2025, 0, 1), Status: 'Delivered' },
      { RefNo: 'A2', Cost: 12.5, ShipDate: new Date(2025, 0, 2), Status: 'Pending', Carrier: 'DHL' },
    ]);
    expect(fields).toEqual([
      { name: 'RefNo', role: 'identifier' },
      { name: 'Cost', role: 'numeric' },
      { name: 'ShipDate', role: 'date' },
      { name: 'Status', role: 'text' },
      { name: 'Carrier', role: 'text' },
    ]);
  });
});

describe('field detection', () => {
  const fields: KnownField[] = [
    { name: 'AWB', role: 'identifier' },
    { name: 'Weight', role: 'numeric' },
    { name: 'Freight Charge', role: 'numeric' },
    { name: 'Delivered On', role: 'date' },
    { name: 'Ship Date', role: 'date' },
    { name: 'Delivery Status', role: 'text' },
  ];

  it('prefers a cost-named numeric field, else the first numeric', () => {
    expect(detectCostField(fields)).toBe('Freight Charge');
    expect(detectCostField([{ name: 'Weight', role: 'numeric' }])).toBe('Weight');
    expect(detectCostField([{ name: 'Status', role: 'text' }])).toBeUndefined();
  });

  it('lets a known override win and ignores an unknown one', () => {
    expect(detectCostField(fields, { costField: 'weight' })).toBe('Weight');
    expect(detectCostField(fields, { costField: 'Nope' })).toBe('Freight Charge');
    expect(detectDateField(fields, { dateField: 'Delivered On' })).toBe('Delivered On');
  });

  it('picks the ship date ahead of other date fields', () => {
    expect(detectDateField(fields)).toBe('Ship Date');
    expect(detectDateField([{ name: 'Updated', role: 'date' }])).toBe('Updated');
  });

  it('finds identifier and status fields', () => {
    expect(detectIdentifierField(fields)).toBe('AWB');
    expect(detectStatusField(fields)).toBe('Delivery Status');
  });
});

describe('resolveFieldToken', () => {
  const fields: KnownField[] = [
    { name: 'Month', role: 'text' },
    { name: 'Carrier', role: 'text' },
    { name: 'ShipDate', role: 'date' },
  ];

  it('matches case-insensitively ignoring spaces', () => {
    expect(resolveFieldToken(fields, 'ship date')).toBe('ShipDate');
    expect(resolveFieldToken(fields, 'CARR')).toBe('Carrier');
  });

  it('only matches a token containing the field name in loose mode', () => {
    expect(resolveFieldToken(fields, 'carrier name')).toBeUndefined();
    expect(resolveFieldToken(fields, 'carrier name', { loose: true })).toBe('Carrier');
  });
});
