/**
 * @parmlens/types
 * parmlensの共通型定義
 */

// parm7
export type {
  Parm7Token,
  Parm7Section,
  Parm7Sections,
  PointerName,
  PointerSet,
  SectionSummary,
} from './parm7.js';
export { POINTER_NAMES } from './parm7.js';

// Tables
export type { TableValue, SystemTable, TableName, SystemTables } from './tables.js';
export { TABLE_NAMES, isTableName } from './tables.js';

// Highlight
export type {
  HighlightMode,
  HighlightSpan,
  BondTerm,
  AngleTerm,
  DihedralTerm,
  OneFourTerm,
  NonbondedTerm,
  Interaction,
  HighlightResult,
  SelectionResult,
} from './highlight.js';
export { HIGHLIGHT_MODES, isHighlightMode } from './highlight.js';

// Atom
export type { AtomMeta, ResidueInfo, Parm7AtomInfo } from './atom.js';

// Errors
export type { ErrorCode, ErrorPayload, ErrorResult } from './errors.js';
export { ERROR_CODES, isErrorCode } from './errors.js';

// Config
export type {
  ParmLensConfig,
  ServerConfig,
  Parm7Config,
  QueryConfig,
  WorkerConfig,
  LoggingConfig,
} from './config.js';
export { DEFAULT_CONFIG, DEFAULT_TOKEN_SECTIONS } from './config.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  CONFIG_ENV_VAR,
  validateConfig,
  type ResolveConfigOptions,
  type PartialParmLensConfig,
} from './config/index.js';

// API
export type {
  LoadRequest,
  LoadResponse,
  GetTextResponse,
  GetSectionsResponse,
  GetTableRequest,
  GetTablesResponse,
  HighlightRequest,
  SelectRequest,
  GetAtomRequest,
  GetAtomResponse,
  GetResidueRequest,
  GetResidueResponse,
  AtomQueryFilters,
  QueryAtomsRequest,
  QueryAtomsResponse,
  GetPdbResponse,
  GetStatusResponse,
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcSuccessResponse,
  JsonRpcErrorResponse,
  JsonRpcError,
} from './api.js';
