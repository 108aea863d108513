/**
 * コマンド共通のエラー表示
 */

import { JsonRpcClientError } from '@parmlens/client';
import { isErrorCode } from '@parmlens/types';

function describeData(data: unknown): { code: string | null; details: unknown } {
  if (typeof data !== 'object' || data === null || !('code' in data) || !isErrorCode(data.code)) {
    return { code: null, details: data };
  }
  return { code: data.code, details: 'details' in data ? data.details : undefined };
}

/**
 * エラーを表示してプロセスを終了
 */
export function exitWithError(error: unknown): never {
  if (error instanceof JsonRpcClientError) {
    const { code, details } = describeData(error.data);
    console.error(`エラー [${code ?? error.code}]: ${error.message}`);
    if (details !== undefined) {
      console.error('詳細:', details);
    }
  } else if (error instanceof Error) {
    if (error.message.includes('fetch')) {
      console.error('エラー: サーバに接続できません。サーバが起動していることを確認してください。');
    } else if (error.message.includes('timeout')) {
      console.error('エラー: リクエストがタイムアウトしました。');
    } else {
      console.error(`エラー: ${error.message}`);
    }
  } else {
    console.error('エラー: 不明なエラーが発生しました。');
  }
  process.exit(1);
}
