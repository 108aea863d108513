import type {
  GetAtomRequest,
  GetAtomResponse,
  GetPdbResponse,
  GetResidueRequest,
  GetResidueResponse,
  GetSectionsResponse,
  GetStatusResponse,
  GetTableRequest,
  GetTablesResponse,
  GetTextResponse,
  HighlightRequest,
  HighlightResult,
  LoadRequest,
  LoadResponse,
  ParmLensConfig,
  QueryAtomsRequest,
  QueryAtomsResponse,
  SelectionResult,
  SelectRequest,
  SystemTable,
} from '@parmlens/types';
import { Model } from '../model/model.js';

export const SERVER_VERSION = '0.1.0';

/**
 * parmlensサーバのメインクラス
 * モデル操作を公開し、リクエスト数を集計する
 */
export class ParmLensService {
  private model: Model;
  private startTime: number = 0;
  private requestStats = {
    total: 0,
    load: 0,
    highlight: 0,
    select: 0,
    tables: 0,
  };

  constructor(private config: ParmLensConfig) {
    this.model = new Model(config);
  }

  /**
   * サーバ起動
   */
  start(): void {
    this.startTime = Date.now();
    console.log(`[ParmLensService] Background builds ${this.config.worker.enabled ? 'enabled' : 'disabled'}`);
  }

  /**
   * サーバ停止（未完了のテーブル構築は取り消す）
   */
  stop(): void {
    this.model.close();
    console.log('[ParmLensService] Stopped');
  }

  async load(request: LoadRequest): Promise<LoadResponse> {
    this.count('load');
    return this.model.load(request.parm7Path, request.rst7Path);
  }

  getText(): GetTextResponse {
    this.count();
    return this.model.getText();
  }

  getSections(): GetSectionsResponse {
    this.count();
    return this.model.getSections();
  }

  async getTables(): Promise<GetTablesResponse> {
    this.count('tables');
    return this.model.getTables();
  }

  async getTable(request: GetTableRequest): Promise<SystemTable> {
    this.count('tables');
    return this.model.getTable(request.table);
  }

  highlight(request: HighlightRequest): HighlightResult {
    this.count('highlight');
    return this.model.highlight(request.serials, request.mode);
  }

  async select(request: SelectRequest): Promise<SelectionResult> {
    this.count('select');
    return this.model.select(request.table, request.row, request.cursor ?? 0);
  }

  getAtom(request: GetAtomRequest): GetAtomResponse {
    this.count();
    return this.model.getAtom(request.serial);
  }

  getResidue(request: GetResidueRequest): GetResidueResponse {
    this.count();
    return this.model.getResidue(request.resid);
  }

  queryAtoms(request: QueryAtomsRequest): QueryAtomsResponse {
    this.count();
    return this.model.queryAtoms(request);
  }

  getPdb(): GetPdbResponse {
    this.count();
    return { pdb: this.model.getPdb() };
  }

  getStatus(): GetStatusResponse {
    return {
      server: {
        version: SERVER_VERSION,
        uptime: this.startTime > 0 ? Date.now() - this.startTime : 0,
        pid: process.pid,
        requests: { ...this.requestStats },
      },
      model: this.model.status(),
    };
  }

  private count(kind?: 'load' | 'highlight' | 'select' | 'tables'): void {
    this.requestStats.total++;
    if (kind) {
      this.requestStats[kind]++;
    }
  }
}
