export type AlertAction = 'BUY' | 'SELL' | 'WATCH';

export type Confidence = 'HIGH' | 'MEDIUM' | 'LOW';

export const CONFIDENCE_ORDER: Readonly<Record<Confidence, number>> = {
  LOW: 0,
  MEDIUM: 1,
  HIGH: 2,
};

export interface SignalAlert {
  symbol: string;
  strategyName: string;
  action: AlertAction;
  confidence: Confidence;
  /** Date and close of the last bar scanned. */
  date: string;
  close: number;
  reason: string;
  /** The strategy's required indicators on the last bar. */
  indicators: Record<string, number>;
  /** Over trades closed by the strategy's own exit signal. */
  winRate: number;
  profitFactor: number;
  closedTrades: number;
  totalReturnPct: number;
  /** Set for WATCH alerts: when the still-open position was entered. */
  entryDate?: string;
  entryPrice?: number;
}
