/**
 * @parmlens/client
 */

export { ParmLensClient, JsonRpcClientError, type ParmLensClientConfig } from './client.js';
