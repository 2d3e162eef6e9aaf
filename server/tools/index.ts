export {
  CRM_TOOLS,
  CRM_TOOL_NAMES,
  type ToolDef,
  type JsonSchemaProperty,
} from './definitions.js';

export {
  executeCrmTool,
  extractResultRowCount,
  type ToolContext,
} from './dispatch.js';

export { isRecord, ToolInputError, type ToolParams } from './params.js';
