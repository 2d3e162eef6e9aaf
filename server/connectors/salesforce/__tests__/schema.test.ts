import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FakeTransport, childRel, describeOf, field } from '../../../__tests__/fake-transport.js';
import { RemoteError } from '../errors.js';
import { SchemaIntrospector, normalizeDescribe, normalizeFieldType } from '../schema.js';

describe('normalizeFieldType', () => {
  it('collapses platform types into the descriptor types', () => {
    expect(normalizeFieldType('reference')).toBe('reference');
    expect(normalizeFieldType('multipicklist')).toBe('picklist');
    expect(normalizeFieldType('double')).toBe('number');
    expect(normalizeFieldType('percent')).toBe('number');
    expect(normalizeFieldType('currency')).toBe('currency');
    expect(normalizeFieldType('datetime')).toBe('date');
    expect(normalizeFieldType('boolean')).toBe('boolean');
    expect(normalizeFieldType('textarea')).toBe('string');
    expect(normalizeFieldType('id')).toBe('string');
  });
});

describe('normalizeDescribe', () => {
  it('maps fields and child relationships', () => {
    const schema = normalizeDescribe(describeOf(
      'Opportunity',
      [
        field('AccountId', 'reference', { label: 'Account ID', referenceTo: ['Account'], nillable: false }),
        field('StageName', 'picklist', {
          picklistValues: [
            { value: 'Prospecting', label: 'Prospecting', active: true },
            { value: 'Retired', label: null, active: false },
          ],
        }),
        { name: 'CloseDate', type: 'date' },
      ],
      [
        childRel('OpportunityLineItem', 'OpportunityId', 'OpportunityLineItems'),
        childRel('OpportunityHistory', 'OpportunityId', null),
        childRel('Broken', '', 'Broken'),
      ]
    ));

    expect(schema.fields[0]).toEqual({
      name: 'AccountId',
      label: 'Account ID',
      type: 'reference',
      rawType: 'reference',
      nullable: false,
      updatable: true,
      referenceTo: 'Account',
    });
    expect(schema.fields[1].picklistValues).toEqual(['Prospecting']);
    expect(schema.fields[2]).toEqual({
      name: 'CloseDate',
      label: 'CloseDate',
      type: 'date',
      rawType: 'date',
      nullable: true,
      updatable: false,
    });
    expect(schema.childRelationships).toEqual([
      { childObject: 'OpportunityLineItem', field: 'OpportunityId', relationshipName: 'OpportunityLineItems' },
      { childObject: 'OpportunityHistory', field: 'OpportunityId', relationshipName: 'OpportunityHistory' },
    ]);
  });
});

describe('SchemaIntrospector', () => {
  let transport: FakeTransport;
  let introspector: SchemaIntrospector;

  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    transport = new FakeTransport();
    introspector = new SchemaIntrospector(transport);
  });

  it('describes an object once and serves repeats from the cache', async () => {
    transport.onDescribe('Account', describeOf('Account', [field('Name', 'string')]));

    const first = await introspector.describe('Account');
    const second = await introspector.describe('Account');

    expect(second).toBe(first);
    expect(transport.callsOf('describe')).toEqual(['Account']);
    expect(introspector.size).toBe(1);
    expect(introspector.peek('Account')).toBe(first);
  });

  it('does not cache failures', async () => {
    transport.onDescribe('Widget', new RemoteError("Salesforce API Error: sObject type 'Widget' is not supported", 404, 'NOT_FOUND'));

    await expect(introspector.describe('Widget')).rejects.toBeInstanceOf(RemoteError);
    expect(introspector.peek('Widget')).toBeUndefined();
    expect(introspector.size).toBe(0);
  });
});
