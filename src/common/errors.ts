export class AppError extends Error {
  constructor(
    public readonly code: string,
    public readonly status: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidAmountError extends AppError {
  constructor(message = "Amount must be greater than zero") {
    super("INVALID_AMOUNT", 400, message);
  }
}

export class InvalidTransferError extends AppError {
  constructor(message = "Source and destination accounts must differ") {
    super("INVALID_TRANSFER", 400, message);
  }
}

export class InsufficientFundsError extends AppError {
  constructor(message = "Insufficient funds") {
    super("INSUFFICIENT_FUNDS", 400, message);
  }
}

export class AccountNotFoundError extends AppError {
  constructor(accountId?: string) {
    super(
      "ACCOUNT_NOT_FOUND",
      404,
      accountId ? `Account ${accountId} not found` : "Account not found"
    );
  }
}

export class ConstraintViolationError extends AppError {
  constructor(message = "Balance constraint violated") {
    super("CONSTRAINT_VIOLATION", 409, message);
  }
}

export class InterestAlreadyAccruedError extends AppError {
  constructor(accountId: string, calculationDate: string) {
    super(
      "INTEREST_ALREADY_ACCRUED",
      409,
      `Interest for ${accountId} already accrued on ${calculationDate}`
    );
  }
}

// Raised inside an accrual unit when the balance earns nothing; the accrual
// counts it as skipped.
export class NoInterestDueError extends AppError {
  constructor(accountId: string) {
    super("NO_INTEREST_DUE", 409, `No interest due for ${accountId}`);
  }
}

export class OperationCancelledError extends AppError {
  constructor(message = "Operation cancelled before commit") {
    super("OPERATION_CANCELLED", 409, message);
  }
}

// Storage errors never carry internal detail in their message; the cause is
// kept for logging only.
export class StorageTimeoutError extends AppError {
  constructor(cause?: unknown) {
    super("STORAGE_TIMEOUT", 503, "Storage did not respond in time", { cause });
  }
}

export class StorageFailureError extends AppError {
  constructor(cause?: unknown) {
    super("STORAGE_FAILURE", 500, "Unexpected storage error", { cause });
  }
}
