/**
 * @parmlens/server
 *
 * parm7トポロジエンジンとJSON-RPCサーバ
 */

import type { ParmLensConfig } from '@parmlens/types';
import { JsonRpcServer } from './server/json-rpc-server.js';
import { ParmLensService } from './server/parmlens-service.js';

export { ParmLensError, FormatError, NotFoundError, ValueParseError, ModelError } from './errors.js';
export { decodeParm7, splitLines, tokenizeParm7 } from './parm7/tokenizer.js';
export { decodePointers } from './parm7/pointers.js';
export { SectionCache } from './parm7/section-cache.js';
export { buildSystemTables } from './tables/builder.js';
export { HighlightEngine } from './highlight/highlight-engine.js';
export { buildSelectionIndex, type SelectionIndex } from './selection/selection-index.js';
export { parseRst7, type Rst7 } from './io/rst7.js';
export { writePdb } from './io/pdb-writer.js';
export { Model } from './model/model.js';
export { LazyBuild } from './worker/lazy-build.js';
export { ParmLensService, SERVER_VERSION } from './server/parmlens-service.js';
export { JsonRpcServer, JSON_RPC_ERROR_CODES } from './server/json-rpc-server.js';

/**
 * 設定に従ってJSON-RPCサーバを起動
 */
export async function startServer(config: ParmLensConfig): Promise<JsonRpcServer> {
  const service = new ParmLensService(config);
  const jsonRpcServer = new JsonRpcServer(service, config.server.host, config.server.port);
  await jsonRpcServer.start();
  console.log(`Server started successfully`);
  console.log(`  - RPC endpoint: http://${config.server.host}:${config.server.port}/rpc`);
  return jsonRpcServer;
}
