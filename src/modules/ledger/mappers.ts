import { fromCents } from "../../common/money";
import type { AccountInfo, ReconciliationReport } from "../accounts/queries";
import type { BalanceResult } from "../accounts/service";
import type { AccrualSummary } from "../interest/service";
import type { TransferConfirmation } from "../transfers/service";
import type { InterestRecord, LedgerTransaction, TransactionType } from "./ledger.store";

// Boundary shapes: decimal amounts instead of cents.

export type TransactionDto = {
  transactionId: number;
  accountId: string;
  type: TransactionType;
  amount: number;
  balanceAfter: number;
  timestamp: string;
  description: string;
  transferId: string | null;
};

export type AccountInfoDto = {
  accountId: string;
  customerName: string;
  balance: number;
  createdAt: string;
  recentTransactions: TransactionDto[];
  accumulatedInterest: number;
};

export type InterestRecordDto = {
  id: number;
  accountId: string;
  interestRate: number;
  calculatedInterest: number;
  calculationDate: string;
  transactionId: number;
};

export function toTransactionDto(tx: LedgerTransaction): TransactionDto {
  return {
    transactionId: tx.transactionId,
    accountId: tx.accountId,
    type: tx.type,
    amount: fromCents(tx.amountCents),
    balanceAfter: fromCents(tx.balanceAfterCents),
    timestamp: tx.timestamp,
    description: tx.description,
    transferId: tx.transferId
  };
}

export function toAccountInfoDto(info: AccountInfo): AccountInfoDto {
  return {
    accountId: info.account.accountId,
    customerName: info.account.customerName,
    balance: fromCents(info.account.balanceCents),
    createdAt: info.account.createdAt,
    recentTransactions: info.recentTransactions.map(toTransactionDto),
    accumulatedInterest: fromCents(info.accumulatedInterestCents)
  };
}

export function toBalanceDto(result: BalanceResult) {
  return {
    accountId: result.accountId,
    balance: fromCents(result.balanceCents),
    transactionId: result.transactionId
  };
}

export function toInterestRecordDto(record: InterestRecord): InterestRecordDto {
  return {
    id: record.id,
    accountId: record.accountId,
    interestRate: Number(record.interestRate),
    calculatedInterest: fromCents(record.calculatedInterestCents),
    calculationDate: record.calculationDate,
    transactionId: record.transactionId
  };
}

export function toTransferDto(confirmation: TransferConfirmation) {
  return {
    transferId: confirmation.transferId,
    fromAccountId: confirmation.fromAccountId,
    toAccountId: confirmation.toAccountId,
    amount: fromCents(confirmation.amountCents),
    fromBalance: fromCents(confirmation.fromBalanceCents),
    toBalance: fromCents(confirmation.toBalanceCents),
    timestamp: confirmation.timestamp
  };
}

export function toAccrualSummaryDto(summary: AccrualSummary) {
  return {
    calculationDate: summary.calculationDate,
    interestRate: Number(summary.interestRate),
    accountsProcessed: summary.accountsProcessed,
    accountsCredited: summary.accountsCredited,
    totalInterest: fromCents(summary.totalInterestCents),
    skipped: summary.skipped,
    alreadyAccrued: summary.alreadyAccrued,
    failed: summary.failed
  };
}

export function toReconciliationDto(report: ReconciliationReport) {
  return {
    accountId: report.accountId,
    balance: fromCents(report.balanceCents),
    expectedBalance: fromCents(report.expectedBalanceCents),
    transactionCount: report.transactionCount,
    consistent: report.consistent
  };
}
