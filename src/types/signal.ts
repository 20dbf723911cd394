export type Direction = 'LONG' | 'SHORT';

export type HoldingTime = '1–2 days' | '2–3 days' | '5–7 days';

/** Display strings of a computed signal */
export interface FormattedSignal {
  entry1: string;
  entry2: string;
  averageEntry: string;
  takeProfit1: string;
  takeProfit2: string;
  stopLoss: string;
  riskPercent: string;
  potentialProfit: string;
}

/** Output of the pricing engine: everything derivable from ticker, entry, stop loss and leverage */
export interface ComputedSignal {
  ticker: string;
  direction: Direction;
  entry1: number;
  /** Midpoint of entry1 and stop loss */
  entry2: number;
  averageEntry: number;
  takeProfit1: number;
  takeProfit2: number;
  stopLoss: number;
  risk: number;
  riskPercent: number;
  leverage: number;
  /** True when the leverage was picked from the risk percent */
  leverageAuto: boolean;
  holdingTime: HoldingTime;
  potentialProfitPercent: number;
  formatted: FormattedSignal;
}

/** Parsed `signal` arguments */
export interface SignalRequest {
  ticker: string;
  entry1: number;
  stopLoss: number;
  leverage: number | null;
  /** Explicit trade link typed by the operator */
  tradeUrl: string | null;
  /** Decimals typed for entry/stop loss, echoed in the output */
  decimals?: number;
}

/** A signal as published to the channel and persisted */
export interface SignalRecord extends ComputedSignal {
  /** Zero-padded sequence number, e.g. 0042 */
  sequenceId: string;
  /** ISO-8601 publish time */
  createdAt: string;
  sender: string;
  tradeUrl: string;
  creative: string;
  /** Channel message id, needed to delete the post */
  messageId: number;
}
