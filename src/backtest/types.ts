export type Signal = 'BUY' | 'SELL' | 'HOLD';

export interface Candle {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** Indicator name → value. Warm-up positions are undefined (or NaN from upstream). */
export type IndicatorValues = Readonly<Record<string, number | undefined>>;

export interface Bar extends Candle {
  indicators: IndicatorValues;
}

export type PriceField = 'open' | 'high' | 'low' | 'close' | 'volume';

/**
 * What a strategy sees on a given bar. Only the current bar and bars before it
 * are reachable through a view.
 */
export interface BarView {
  readonly index: number;
  readonly date: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
  value(name: string): number | undefined;
  has(...names: string[]): boolean;
  previous(offset?: number): BarView | undefined;
  window(field: PriceField, length: number): readonly number[] | undefined;
}

export interface Position {
  readonly entryIndex: number;
  readonly entryDate: string;
  readonly entryPrice: number;
  readonly quantity: number;
  readonly entryCommission: number;
  /** Capital the position was opened with, before the entry commission. */
  readonly capitalAtEntry: number;
}

export type ExitReason = 'signal' | 'forced_exit';

export interface Trade {
  readonly entryIndex: number;
  readonly exitIndex: number;
  readonly entryDate: string;
  readonly exitDate: string;
  readonly entryPrice: number;
  readonly exitPrice: number;
  readonly quantity: number;
  /** Net of entry and exit commission. */
  readonly realizedPnl: number;
  /** Fraction of the cost basis (0.1 = +10%). */
  readonly realizedPnlPct: number;
  readonly commission: number;
  readonly holdingBars: number;
  readonly exitReason: ExitReason;
}

export interface EquityPoint {
  readonly date: string;
  readonly equity: number;
}

export interface BacktestOptions {
  initialCapital: number;
  commission: number;
  slippage: number;
  minimumBars: number;
  minimumTrades: number;
  tradingPeriodsPerYear: number;
  riskFreeRate: number;
}

export interface PerformanceMetrics {
  totalTrades: number;
  winCount: number;
  lossCount: number;
  /** Fraction of trades with realizedPnl > 0; 0 when there are no trades. */
  winRate: number;
  totalPnl: number;
  totalReturnPct: number;
  /** Peak-to-trough decline of the equity curve in percent; 0 or negative. */
  maxDrawdownPct: number;
  sharpeRatio: number;
  sortinoRatio: number | null;
  calmarRatio: number | null;
  sqn: number | null;
  expectancy: number | null;
  /** Number.POSITIVE_INFINITY when there are gains and no losing trades. */
  profitFactor: number;
  avgWin: number | null;
  avgLoss: number | null;
  avgHoldingBars: number;
  bestTradePct: number | null;
  worstTradePct: number | null;
  insufficientSample: boolean;
}

export interface BacktestFlags {
  /** A position was still open on the last bar and closed there. */
  forcedExit: boolean;
  /** Fewer trades than minimumTrades (always true with zero trades). */
  insufficientSample: boolean;
  /** BUY signals that could not be filled for lack of capital. */
  rejectedEntries: number;
}

export interface BacktestResult {
  readonly symbol: string;
  readonly strategyName: string;
  readonly startDate: string;
  readonly endDate: string;
  readonly barsProcessed: number;
  /** Bars skipped because a required indicator was still undefined. */
  readonly warmupBars: number;
  readonly initialCapital: number;
  readonly finalCapital: number;
  readonly options: Readonly<BacktestOptions>;
  readonly metrics: Readonly<PerformanceMetrics>;
  readonly flags: Readonly<BacktestFlags>;
  readonly trades: readonly Trade[];
  readonly equityCurve: readonly EquityPoint[];
}

/** Pure decision rule over the current bar view and the open position, if any. */
export type StrategyFunction = (view: BarView, position: Position | null) => Signal;

/** The part of a strategy the engine needs. */
export interface BacktestStrategy {
  readonly name: string;
  /** Bars where any of these is undefined are warm-up bars: the strategy is not consulted. */
  readonly requiredIndicators?: readonly string[];
  readonly minimumBars?: number;
  evaluate: StrategyFunction;
}
