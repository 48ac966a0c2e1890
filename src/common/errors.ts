export class AppError extends Error {
  constructor(
    public readonly code: string,
    public readonly status: number,
    message: string
  ) {
    super(message);
  }
}

export class AccountNotFoundError extends AppError {
  constructor(message = "Account not found") {
    super("ACCOUNT_NOT_FOUND", 404, message);
  }
}

export class DuplicateAccountError extends AppError {
  constructor(message = "Account with this number already exists") {
    super("DUPLICATE_ACCOUNT", 409, message);
  }
}

export class InvalidAmountError extends AppError {
  constructor(message = "Amount must be greater than zero") {
    super("INVALID_AMOUNT", 400, message);
  }
}

export class InvalidRequestError extends AppError {
  constructor(message = "Validation failed") {
    super("INVALID_REQUEST", 400, message);
  }
}

export class InsufficientFundsError extends AppError {
  constructor(message = "Insufficient funds") {
    super("INSUFFICIENT_FUNDS", 409, message);
  }
}

export class OverdraftExceededError extends AppError {
  constructor(message = "Exceeds overdraft limit") {
    super("OVERDRAFT_EXCEEDED", 409, message);
  }
}

export class LockPeriodActiveError extends AppError {
  constructor(message = "Withdrawal not allowed before lock-in period ends") {
    super("LOCK_PERIOD_ACTIVE", 409, message);
  }
}

export class UnsupportedOperationError extends AppError {
  constructor(message = "Operation not supported for this account type") {
    super("UNSUPPORTED_OPERATION", 409, message);
  }
}
