export interface AccountSnapshot {
	startingBalance: number;
	balance: number;
	equity: number;
	totalRealizedPnl: number;
	maxEquity: number;
	maxDrawdown: number;
	trades: {
		total: number;
		wins: number;
		losses: number;
		breakeven: number;
	};
}

/**
 * Running balance and win/loss tally fed by closed trades.
 */
export class PaperAccount {
	private readonly startingBalance: number;
	private balance: number;
	private equity: number;
	private maxEquity: number;
	private readonly trades = {
		total: 0,
		wins: 0,
		losses: 0,
		breakeven: 0,
	};

	constructor(startingBalance: number) {
		this.startingBalance = startingBalance;
		this.balance = startingBalance;
		this.equity = startingBalance;
		this.maxEquity = startingBalance;
	}

	registerClosedTrade(realizedPnl: number): void {
		this.balance += realizedPnl;
		this.trades.total += 1;

		if (realizedPnl > 0) {
			this.trades.wins += 1;
		} else if (realizedPnl < 0) {
			this.trades.losses += 1;
		} else {
			this.trades.breakeven += 1;
		}
		this.snapshot(0);
	}

	snapshot(unrealizedPnl: number): AccountSnapshot {
		this.equity = this.balance + unrealizedPnl;
		if (this.equity > this.maxEquity) {
			this.maxEquity = this.equity;
		}

		return {
			startingBalance: this.startingBalance,
			balance: this.balance,
			equity: this.equity,
			totalRealizedPnl: this.balance - this.startingBalance,
			maxEquity: this.maxEquity,
			maxDrawdown: this.maxEquity - this.equity,
			trades: { ...this.trades },
		};
	}
}
