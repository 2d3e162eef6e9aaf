/**
 * Tool definitions exposed to the agent.
 *
 * Same shape as a function-calling tool: the `parameters` block is JSON Schema
 * and can be handed to a model provider as its input schema unchanged.
 */

export interface JsonSchemaProperty {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array';
  description?: string;
  enum?: string[];
  items?: JsonSchemaProperty;
  properties?: Record<string, JsonSchemaProperty>;
  required?: string[];
}

export interface ToolDef {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

const OBJECT_NAME: JsonSchemaProperty = {
  type: 'string',
  description: 'Salesforce object API name (e.g., Account, Contact, Opportunity)',
};

const RECORD_ID: JsonSchemaProperty = { type: 'string', description: 'The ID of the record' };

const AGGREGATE_ITEM: JsonSchemaProperty = {
  type: 'object',
  properties: {
    function: { type: 'string', enum: ['COUNT', 'SUM', 'AVG', 'MAX', 'MIN'] },
    field: { type: 'string', description: 'Field to aggregate (default: Id)' },
    alias: { type: 'string', description: 'Result column name (default: FUNCTION_field)' },
  },
  required: ['function'],
};

export const CRM_TOOLS: ToolDef[] = [
  // ─── Record API ─────────────────────────────────────────────────────────────
  {
    name: 'salesforce_query',
    description: 'Execute a SOQL query against Salesforce.',
    parameters: {
      type: 'object',
      properties: { q: { type: 'string', description: 'The SOQL query to execute' } },
      required: ['q'],
    },
  },
  {
    name: 'salesforce_sobjects',
    description: 'List all available Salesforce objects.',
    parameters: { type: 'object', properties: {}, required: [] },
  },
  {
    name: 'salesforce_recent',
    description: 'Fetch recently accessed Salesforce records.',
    parameters: {
      type: 'object',
      properties: { limit: { type: 'integer', description: 'Maximum number of records (default 20)' } },
      required: [],
    },
  },
  {
    name: 'salesforce_search',
    description: 'Execute a raw SOSL search against Salesforce.',
    parameters: {
      type: 'object',
      properties: { q: { type: 'string', description: 'The SOSL search to execute' } },
      required: ['q'],
    },
  },
  {
    name: 'salesforce_describe',
    description: 'Get field and relationship metadata for a Salesforce object.',
    parameters: {
      type: 'object',
      properties: { object_name: OBJECT_NAME },
      required: ['object_name'],
    },
  },
  {
    name: 'salesforce_create',
    description: 'Create a new record.',
    parameters: {
      type: 'object',
      properties: {
        object_name: OBJECT_NAME,
        record_data: { type: 'object', description: 'Field values for the new record' },
      },
      required: ['object_name', 'record_data'],
    },
  },
  {
    name: 'salesforce_update',
    description: 'Update an existing record.',
    parameters: {
      type: 'object',
      properties: {
        object_name: OBJECT_NAME,
        record_id: RECORD_ID,
        record_data: { type: 'object', description: 'Field values to update' },
      },
      required: ['object_name', 'record_id', 'record_data'],
    },
  },
  {
    name: 'salesforce_delete',
    description: 'Delete a record.',
    parameters: {
      type: 'object',
      properties: { object_name: OBJECT_NAME, record_id: RECORD_ID },
      required: ['object_name', 'record_id'],
    },
  },

  // ─── Navigation ─────────────────────────────────────────────────────────────
  {
    name: 'salesforce_relationships',
    description:
      'Get related records for a record (e.g., Contacts for an Account). With relationship_name, returns that relationship and fails if anything goes wrong; without it, samples the first relationships and skips any that cannot be read.',
    parameters: {
      type: 'object',
      properties: {
        object_name: OBJECT_NAME,
        record_id: RECORD_ID,
        relationship_name: {
          type: 'string',
          description: 'Optional child object to query (e.g., Contact, Opportunity)',
        },
      },
      required: ['object_name', 'record_id'],
    },
  },
  {
    name: 'salesforce_lookup',
    description:
      'Search for records by name, email or other fields. Uses full-text search and falls back to a LIKE query if search is unavailable.',
    parameters: {
      type: 'object',
      properties: {
        object_name: OBJECT_NAME,
        search_term: { type: 'string', description: 'Term to search for (e.g., "acme", "jane@example.com")' },
        search_fields: {
          type: 'array',
          items: { type: 'string' },
          description: 'Fields to return and match (default: ["Name"])',
        },
        limit: { type: 'integer', description: 'Maximum number of results (default 10)' },
      },
      required: ['object_name', 'search_term'],
    },
  },
  {
    name: 'salesforce_hierarchy',
    description: 'Navigate parent ("up") or child ("down") relationships of a record.',
    parameters: {
      type: 'object',
      properties: {
        object_name: OBJECT_NAME,
        record_id: RECORD_ID,
        direction: { type: 'string', enum: ['up', 'down'], description: 'Default: down' },
        max_items: {
          type: 'integer',
          description: 'Parent fields (up) or child relationships (down) to follow (default 3)',
        },
      },
      required: ['object_name', 'record_id'],
    },
  },

  // ─── Analytics ──────────────────────────────────────────────────────────────
  {
    name: 'salesforce_aggregate',
    description: 'Statistical analysis of Salesforce data (COUNT, SUM, AVG, MAX, MIN), optionally grouped.',
    parameters: {
      type: 'object',
      properties: {
        object_name: OBJECT_NAME,
        aggregates: { type: 'array', items: AGGREGATE_ITEM, description: 'Aggregations to apply' },
        group_by: { type: 'string', description: 'Field to group by (e.g., StageName, Owner.Name)' },
        where_clause: { type: 'string', description: 'Optional WHERE condition (e.g., "CreatedDate = THIS_MONTH")' },
        limit: { type: 'integer', description: 'Maximum number of rows (default 100)' },
      },
      required: ['object_name', 'aggregates'],
    },
  },
  {
    name: 'salesforce_reports',
    description: 'Find and run existing Salesforce reports. Lists recent reports when neither argument is given.',
    parameters: {
      type: 'object',
      properties: {
        report_id: { type: 'string', description: 'Specific report ID to run' },
        report_name: { type: 'string', description: 'Name of the report to find and run' },
      },
      required: [],
    },
  },
  {
    name: 'salesforce_trend_analysis',
    description: 'Time series of metrics bucketed by day, week or month.',
    parameters: {
      type: 'object',
      properties: {
        object_name: OBJECT_NAME,
        date_field: { type: 'string', description: 'Date field to bucket on (default: CreatedDate)' },
        period: { type: 'string', enum: ['day', 'week', 'month'], description: 'Bucket size (default: month)' },
        metrics: { type: 'array', items: AGGREGATE_ITEM, description: 'Metrics per bucket (default: record count)' },
        timeframe: { type: 'integer', description: 'Number of periods to look back (default 6)' },
        where_clause: { type: 'string', description: 'Optional extra WHERE condition' },
      },
      required: ['object_name'],
    },
  },

  // ─── Business intelligence ─────────────────────────────────────────────────
  {
    name: 'salesforce_pipeline',
    description: 'Sales pipeline analysis: stage breakdown, win/loss, stage counts, and optional weighted forecast.',
    parameters: {
      type: 'object',
      properties: {
        timeframe: { type: 'string', description: 'SOQL date literal (default THIS_QUARTER)' },
        owner_id: { type: 'string', description: 'Optional sales rep user ID' },
        include_forecasting: { type: 'boolean', description: 'Include forecast (default false)' },
      },
      required: [],
    },
  },
  {
    name: 'salesforce_case_insights',
    description: 'Support case volume, escalations, account-type mix and owner load.',
    parameters: {
      type: 'object',
      properties: {
        timeframe: { type: 'string', description: 'SOQL date literal (default THIS_MONTH)' },
        priority: { type: 'string', description: 'Filter by priority (e.g., High)' },
        status: { type: 'string', description: 'Filter by status (e.g., Escalated)' },
      },
      required: [],
    },
  },
  {
    name: 'salesforce_lead_funnel',
    description: 'Lead conversion funnel by source with quality breakdown and top converted opportunities.',
    parameters: {
      type: 'object',
      properties: {
        source: { type: 'string', description: 'Optional lead source filter (e.g., Web, Partner)' },
        timeframe: { type: 'string', description: 'SOQL date literal (default THIS_QUARTER)' },
        conversion_stage: { type: 'string', description: 'Target conversion stage (default Opportunity)' },
      },
      required: [],
    },
  },
  {
    name: 'salesforce_at_risk',
    description: 'Open opportunities below a probability threshold, with value at risk and overdue count.',
    parameters: {
      type: 'object',
      properties: {
        stages: { type: 'array', items: { type: 'string' }, description: 'Restrict to these stage names' },
        max_probability: { type: 'number', description: 'Probability threshold in percent (default 50)' },
        owner_id: { type: 'string', description: 'Optional sales rep user ID' },
        limit: { type: 'integer', description: 'Maximum deals to list (default 25)' },
      },
      required: [],
    },
  },
];

export const CRM_TOOL_NAMES = CRM_TOOLS.map(t => t.name);
