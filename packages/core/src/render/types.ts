/**
 * A document realm scripts can be evaluated in: a browser page or a jsdom window.
 */
export interface ScriptPage {
  /** Evaluate a JavaScript expression; a returned promise is awaited. */
  evaluate<TResult>(expression: string): Promise<TResult>;

  /** Inject a classic script into the document. */
  addScript(source: string): Promise<void>;
}

export interface NavigationOptions {
  /** Budget for reaching the `load` event. */
  timeoutMs: number;

  /** Extra wait for network idle after `load`. */
  settleMs: number;
}

/**
 * A page inside a leased browser context.
 */
export interface RenderPage extends ScriptPage {
  /**
   * Navigate and wait for a stable load state.
   *
   * Rejects with `NavigationTimeoutError` when `load` is not reached in time and
   * `RenderFailureError` when the browser fails. Resolves `settled: false` when
   * the settle ceiling was hit before the network went idle.
   */
  goto(url: string, options: NavigationOptions): Promise<{ settled: boolean }>;

  close(): Promise<void>;
}

/**
 * An isolated browser context (own cookies, storage and navigation state).
 */
export interface RenderContext {
  readonly id: string;
  newPage(): Promise<RenderPage>;
  close(): Promise<void>;
}

/**
 * A running browser process.
 */
export interface BrowserHandle {
  newContext(): Promise<RenderContext>;
  isConnected(): boolean;
  close(): Promise<void>;
}

/**
 * Starts browser processes. Rejects with `RenderFailureError` when it cannot.
 */
export interface BrowserLauncher {
  launch(): Promise<BrowserHandle>;
}
