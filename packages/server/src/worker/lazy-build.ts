/**
 * LazyBuild
 * スナップショット単位の派生データ構築を1回だけ実行するワーカー
 */

/**
 * LazyBuild
 *
 * 役割:
 * - 構築関数を1回だけ実行し、結果のPromiseを保持
 * - start() は次のイベントループで構築を開始（呼び出し元をブロックしない）
 * - 失敗した場合は保持を破棄し、次の get() で再試行
 * - cancel() は開始前の構築を取り消し、待機中の呼び出し元を reject する
 */
export class LazyBuild<T> {
  private promise: Promise<T> | null = null;
  private scheduled: { immediate: NodeJS.Immediate; reject: (error: Error) => void } | null = null;
  private built = false;

  constructor(
    private readonly name: string,
    private readonly producer: () => T,
    private readonly onBuilt?: (name: string, durationMs: number) => void
  ) {}

  /**
   * バックグラウンドで構築を開始
   * 失敗はここではログのみ。呼び出し元には get() で伝わる
   */
  start(): void {
    if (this.promise || this.built) {
      return;
    }
    this.run().catch((error: unknown) => {
      console.warn(`[BuildWorker] ${this.name} build failed:`, error instanceof Error ? error.message : error);
    });
  }

  /**
   * 構築結果を待機（未開始ならここで開始）
   */
  get(): Promise<T> {
    return this.run();
  }

  /**
   * まだ実行されていない構築を取り消す
   */
  cancel(): void {
    const scheduled = this.scheduled;
    if (!scheduled) {
      return;
    }
    clearImmediate(scheduled.immediate);
    this.scheduled = null;
    this.promise = null;
    scheduled.reject(new Error(`${this.name} build cancelled`));
  }

  /**
   * 構築済みかどうか
   */
  isReady(): boolean {
    return this.built;
  }

  private run(): Promise<T> {
    if (!this.promise) {
      this.promise = new Promise<T>((resolve, reject) => {
        const immediate = setImmediate(() => {
          this.scheduled = null;
          const startTime = Date.now();
          try {
            const value = this.producer();
            this.built = true;
            this.onBuilt?.(this.name, Date.now() - startTime);
            resolve(value);
          } catch (error) {
            this.promise = null;
            reject(error);
          }
        });
        this.scheduled = { immediate, reject };
      });
    }
    return this.promise;
  }
}
