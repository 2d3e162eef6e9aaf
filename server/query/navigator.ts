/**
 * Relational Navigator
 *
 * Walks parent references and child relationships discovered at runtime.
 *
 * Two failure policies live here on purpose:
 *  - resolveChildren / listRelated fan out over several relationships and drop
 *    any relationship whose sub-query fails.
 *  - resolveNamedRelationship asks for exactly one relationship and lets every
 *    failure through.
 * Sub-queries always run one after another.
 */

import { createLogger } from '../utils/logger.js';
import { NotFoundError, SalesforceError } from '../connectors/salesforce/errors.js';
import type { FieldDescriptor, SchemaIntrospector } from '../connectors/salesforce/schema.js';
import type { SalesforceRecord, SalesforceTransport } from '../connectors/salesforce/types.js';
import { buildSelectQuery, soqlString } from './soql-builder.js';
import { IDENTITY_FIELD } from './types.js';

const logger = createLogger('Navigator');

const FOREIGN_KEY_SUFFIX = 'Id';
const PARENT_HINT = 'parent';
const CHILD_PROJECTION = [IDENTITY_FIELD, 'Name'];

export interface ParentNavigation {
  direction: 'up';
  /** null only when the object has no parent references to read. */
  record: SalesforceRecord | null;
  parentFields: FieldDescriptor[];
}

export interface ChildNavigation {
  direction: 'down';
  children: Record<string, SalesforceRecord[]>;
}

export type NavigationResult = ParentNavigation | ChildNavigation;

export interface ChildFanOutOptions {
  maxRelationships?: number;
  rowsPerRelationship?: number;
  /** Prefer relationships whose field or alias mentions "parent"; falls back to all when none do. */
  preferParentOriented?: boolean;
}

export class RelationalNavigator {
  constructor(
    private transport: SalesforceTransport,
    private schemas: SchemaIntrospector
  ) {}

  async resolveParents(objectName: string, recordId: string, maxFields = 3): Promise<ParentNavigation> {
    const schema = await this.schemas.describe(objectName);

    // Declared order is the tie-break; no relevance ranking.
    const parentFields = schema.fields
      .filter(f =>
        f.type === 'reference' &&
        f.name.endsWith(FOREIGN_KEY_SUFFIX) &&
        f.name !== IDENTITY_FIELD
      )
      .slice(0, maxFields);

    if (parentFields.length === 0) {
      logger.debug('No parent references', { objectName });
      return { direction: 'up', record: null, parentFields: [] };
    }

    const soql = buildSelectQuery({
      object: objectName,
      fields: [IDENTITY_FIELD, ...parentFields.map(f => f.name)],
      where: `${IDENTITY_FIELD} = ${soqlString(recordId)}`,
      limit: 1,
    });
    const result = await this.transport.query(soql);

    if (result.records.length === 0) {
      throw new NotFoundError(objectName, recordId);
    }

    return { direction: 'up', record: result.records[0], parentFields };
  }

  async resolveChildren(
    objectName: string,
    recordId: string,
    options: ChildFanOutOptions = {}
  ): Promise<ChildNavigation> {
    const {
      maxRelationships = 3,
      rowsPerRelationship = 5,
      preferParentOriented = true,
    } = options;

    const schema = await this.schemas.describe(objectName);
    let eligible = schema.childRelationships;

    if (preferParentOriented) {
      const parentOriented = eligible.filter(rel =>
        rel.field.toLowerCase().includes(PARENT_HINT) ||
        rel.relationshipName.toLowerCase().includes(PARENT_HINT)
      );
      if (parentOriented.length > 0) {
        eligible = parentOriented;
      }
    }

    const children: Record<string, SalesforceRecord[]> = {};

    for (const rel of eligible.slice(0, maxRelationships)) {
      const soql = buildSelectQuery({
        object: rel.childObject,
        fields: CHILD_PROJECTION,
        where: `${rel.field} = ${soqlString(recordId)}`,
        limit: rowsPerRelationship,
      });

      try {
        const result = await this.transport.query(soql);
        children[rel.relationshipName] = result.records;
      } catch (error) {
        if (!(error instanceof SalesforceError)) throw error;
        logger.warn('Skipping inaccessible relationship', {
          objectName,
          relationship: rel.relationshipName,
          childObject: rel.childObject,
          error: error.message,
        });
      }
    }

    return { direction: 'down', children };
  }

  /** Unfiltered fan-out over the first relationships, for "what is related to this record". */
  async listRelated(objectName: string, recordId: string): Promise<ChildNavigation> {
    return this.resolveChildren(objectName, recordId, {
      maxRelationships: 5,
      rowsPerRelationship: 10,
      preferParentOriented: false,
    });
  }

  /**
   * Direct path for a known relationship. The relationship name is queried as
   * the child object, joined on the conventional `{Parent}Id` foreign key.
   */
  async resolveNamedRelationship(
    objectName: string,
    recordId: string,
    relationshipName: string,
    limit = 100
  ): Promise<SalesforceRecord[]> {
    const parent = await this.transport.query(buildSelectQuery({
      object: objectName,
      fields: [IDENTITY_FIELD],
      where: `${IDENTITY_FIELD} = ${soqlString(recordId)}`,
      limit: 1,
    }));

    if (parent.records.length === 0) {
      throw new NotFoundError(objectName, recordId);
    }

    const related = await this.transport.query(buildSelectQuery({
      object: relationshipName,
      fields: CHILD_PROJECTION,
      where: `${objectName}${FOREIGN_KEY_SUFFIX} = ${soqlString(recordId)}`,
      limit,
    }));

    return related.records;
  }
}
