/**
 * Schema Introspector
 *
 * Fetches describe metadata through the transport and normalizes it into an
 * ObjectSchema. Entries are cached per object name for the lifetime of the
 * instance and never invalidated. Two callers asking for the same uncached
 * object may both fetch; the entries they write are equivalent, so whichever
 * lands last is kept.
 */

import { createLogger } from '../../utils/logger.js';
import type {
  SalesforceDescribeChildRelationship,
  SalesforceDescribeField,
  SalesforceObjectDescribe,
  SalesforceTransport,
} from './types.js';

const logger = createLogger('Schema');

export type FieldType = 'string' | 'number' | 'boolean' | 'reference' | 'picklist' | 'date' | 'currency';

export interface FieldDescriptor {
  name: string;
  label: string;
  type: FieldType;
  /** Platform type before normalization, e.g. `datetime` or `textarea`. */
  rawType: string;
  nullable: boolean;
  updatable: boolean;
  referenceTo?: string;
  picklistValues?: string[];
}

export interface ChildRelationship {
  childObject: string;
  field: string;
  relationshipName: string;
}

export interface ObjectSchema {
  name: string;
  fields: FieldDescriptor[];
  childRelationships: ChildRelationship[];
}

const RAW_TYPE_MAP: Record<string, FieldType> = {
  reference: 'reference',
  picklist: 'picklist',
  multipicklist: 'picklist',
  boolean: 'boolean',
  double: 'number',
  int: 'number',
  long: 'number',
  percent: 'number',
  currency: 'currency',
  date: 'date',
  datetime: 'date',
  time: 'date',
};

export function normalizeFieldType(rawType: string): FieldType {
  return RAW_TYPE_MAP[rawType.toLowerCase()] ?? 'string';
}

function toFieldDescriptor(field: SalesforceDescribeField): FieldDescriptor {
  const type = normalizeFieldType(field.type);
  const descriptor: FieldDescriptor = {
    name: field.name,
    label: field.label || field.name,
    type,
    rawType: field.type.toLowerCase(),
    nullable: field.nillable ?? true,
    updatable: field.updateable ?? false,
  };

  if (type === 'reference' && field.referenceTo && field.referenceTo.length > 0) {
    descriptor.referenceTo = field.referenceTo[0];
  }

  if (type === 'picklist' && field.picklistValues) {
    descriptor.picklistValues = field.picklistValues
      .filter(pv => pv.active)
      .map(pv => pv.value);
  }

  return descriptor;
}

function toChildRelationship(rel: SalesforceDescribeChildRelationship): ChildRelationship {
  return {
    childObject: rel.childSObject,
    field: rel.field,
    relationshipName: rel.relationshipName || rel.childSObject,
  };
}

export function normalizeDescribe(describe: SalesforceObjectDescribe): ObjectSchema {
  return {
    name: describe.name,
    fields: (describe.fields ?? []).map(toFieldDescriptor),
    childRelationships: (describe.childRelationships ?? [])
      .filter(rel => Boolean(rel.field))
      .map(toChildRelationship),
  };
}

export class SchemaIntrospector {
  private cache = new Map<string, ObjectSchema>();

  constructor(private transport: SalesforceTransport) {}

  async describe(objectName: string): Promise<ObjectSchema> {
    const cached = this.cache.get(objectName);
    if (cached) return cached;

    const startTime = Date.now();
    const schema = normalizeDescribe(await this.transport.describe(objectName));
    this.cache.set(objectName, schema);

    logger.debug('Described object', {
      objectName,
      fields: schema.fields.length,
      childRelationships: schema.childRelationships.length,
      duration: Date.now() - startTime,
    });

    return schema;
  }

  peek(objectName: string): ObjectSchema | undefined {
    return this.cache.get(objectName);
  }

  get size(): number {
    return this.cache.size;
  }
}
