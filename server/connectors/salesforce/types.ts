/**
 * Salesforce API Types
 *
 * Shapes of the REST responses the engine reads, plus the transport contract
 * every higher layer depends on.
 */

// ============================================================================
// Records
// ============================================================================

/**
 * A record as returned by SOQL/SOSL. Relationship projections arrive as nested
 * objects (`Account: { Name }`), aggregate results as top-level aliased keys.
 */
export interface SalesforceRecord {
  attributes?: { type: string; url?: string };
  [field: string]: unknown;
}

export interface SalesforceQueryResult<T = SalesforceRecord> {
  totalSize: number;
  done: boolean;
  records: T[];
  nextRecordsUrl?: string;
}

export interface SalesforceSearchResult {
  searchRecords: SalesforceRecord[];
}

export interface SalesforceApiErrorEntry {
  message?: string;
  errorCode?: string;
  fields?: string[];
}

// ============================================================================
// Describe
// ============================================================================

export interface SalesforcePicklistEntry {
  value: string;
  label: string | null;
  active: boolean;
  defaultValue?: boolean;
}

export interface SalesforceDescribeField {
  name: string;
  label?: string;
  type: string;
  nillable?: boolean;
  updateable?: boolean;
  custom?: boolean;
  referenceTo?: string[];
  relationshipName?: string | null;
  picklistValues?: SalesforcePicklistEntry[];
}

export interface SalesforceDescribeChildRelationship {
  childSObject: string;
  field: string;
  relationshipName: string | null;
  cascadeDelete?: boolean;
}

export interface SalesforceObjectDescribe {
  name: string;
  label?: string;
  fields: SalesforceDescribeField[];
  childRelationships?: SalesforceDescribeChildRelationship[];
  [key: string]: unknown;
}

// ============================================================================
// Record operations
// ============================================================================

export interface SalesforceSaveResult {
  id: string;
  success: boolean;
  errors?: SalesforceApiErrorEntry[];
}

export interface SalesforceMutationResult {
  success: true;
  id: string;
}

export interface SalesforceApiLimits {
  used: number;
  total: number;
  percentUsed: number;
}

// ============================================================================
// Transport contract
// ============================================================================

/**
 * What the query engine needs from the wire. SalesforceClient is the real
 * implementation; tests substitute an in-process fake.
 */
export interface SalesforceTransport {
  query<T = SalesforceRecord>(soql: string): Promise<SalesforceQueryResult<T>>;
  search(sosl: string): Promise<SalesforceSearchResult>;
  describe(objectName: string): Promise<SalesforceObjectDescribe>;
  get<T = unknown>(path: string): Promise<T>;
}

/** Forwarding calls used only by the tool surface. */
export interface SalesforceRecordApi {
  listObjects(): Promise<unknown>;
  recent(limit: number): Promise<SalesforceRecord[]>;
  createRecord(objectName: string, data: Record<string, unknown>): Promise<SalesforceSaveResult>;
  updateRecord(objectName: string, recordId: string, data: Record<string, unknown>): Promise<SalesforceMutationResult>;
  deleteRecord(objectName: string, recordId: string): Promise<SalesforceMutationResult>;
}
