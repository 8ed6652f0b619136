export type {
	BalanceMoved,
	CounterpartyPool,
	LedgerAccount,
	LedgerEvents,
	Settlement,
} from "./types.js";
export { CashPool } from "./cash-pool.js";
export { SharePool, type ShareMovement } from "./share-pool.js";
export { CustodyLedger, type CustodyLedgerOptions } from "./custody-ledger.js";
