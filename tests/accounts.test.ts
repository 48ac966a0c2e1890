import { buildApp } from "../src/app";
import { FastifyInstance } from "fastify";

let app: FastifyInstance;
let nowValue = new Date("2024-01-01T00:00:00Z");
const now = () => nowValue;

async function createAccount(payload: Record<string, unknown>) {
  return app.inject({
    method: "POST",
    url: "/accounts",
    payload: {
      holderName: "Alice",
      initialBalanceCents: 100_000,
      ...payload
    }
  });
}

beforeEach(async () => {
  nowValue = new Date("2024-01-01T00:00:00Z");
  app = buildApp({ now });
  await app.ready();
});

afterEach(async () => {
  await app.close();
});

test("health check", async () => {
  const res = await app.inject({ method: "GET", url: "/health" });
  expect(res.statusCode).toBe(200);
  expect(res.json()).toEqual({ status: "ok" });
});

test("open savings account, deposit, apply interest and withdraw", async () => {
  const createRes = await createAccount({
    accountId: "S1001",
    accountType: "savings",
    interestRatePercent: 3.5
  });
  expect(createRes.statusCode).toBe(201);
  expect(createRes.json()).toEqual({
    accountId: "S1001",
    holderName: "Alice",
    accountType: "savings",
    balanceCents: 100_000,
    interestRatePercent: 3.5
  });

  const depositRes = await app.inject({
    method: "POST",
    url: "/accounts/S1001/deposit",
    payload: { amountCents: 50_000 }
  });
  expect(depositRes.statusCode).toBe(200);
  expect(depositRes.json()).toEqual({
    accountId: "S1001",
    balanceCents: 150_000,
    message: "[Alice] Deposited $500.00"
  });

  const interestRes = await app.inject({
    method: "POST",
    url: "/accounts/S1001/interest"
  });
  expect(interestRes.statusCode).toBe(200);
  expect(interestRes.json().balanceCents).toBe(155_250);

  const withdrawRes = await app.inject({
    method: "POST",
    url: "/accounts/S1001/withdraw",
    payload: { amountCents: 20_000 }
  });
  expect(withdrawRes.statusCode).toBe(200);
  expect(withdrawRes.json().balanceCents).toBe(135_250);

  const balanceRes = await app.inject({ method: "GET", url: "/accounts/S1001/balance" });
  expect(balanceRes.json()).toEqual({ accountId: "S1001", balanceCents: 135_250 });
});

test("duplicate account id returns 409", async () => {
  await createAccount({ accountId: "B1", accountType: "basic" });
  const res = await createAccount({ accountId: "B1", accountType: "basic" });
  expect(res.statusCode).toBe(409);
  expect(res.json().error).toBe("DUPLICATE_ACCOUNT");
});

test("variant fields are required by account type", async () => {
  const res = await createAccount({ accountId: "C1", accountType: "current" });
  expect(res.statusCode).toBe(400);
  expect(res.json().error).toBe("INVALID_REQUEST");
});

test("insufficient funds returns 409", async () => {
  await createAccount({ accountId: "B1", accountType: "basic", initialBalanceCents: 1_000 });
  const res = await app.inject({
    method: "POST",
    url: "/accounts/B1/withdraw",
    payload: { amountCents: 2_000 }
  });
  expect(res.statusCode).toBe(409);
  expect(res.json().error).toBe("INSUFFICIENT_FUNDS");
});

test("current account overdraft and its limit", async () => {
  await createAccount({
    accountId: "C1001",
    holderName: "Bob",
    accountType: "current",
    overdraftLimitCents: 50_000,
    initialBalanceCents: 20_000
  });

  const ok = await app.inject({
    method: "POST",
    url: "/accounts/C1001/withdraw",
    payload: { amountCents: 60_000 }
  });
  expect(ok.statusCode).toBe(200);
  expect(ok.json().balanceCents).toBe(-40_000);

  const refused = await app.inject({
    method: "POST",
    url: "/accounts/C1001/withdraw",
    payload: { amountCents: 10_001 }
  });
  expect(refused.statusCode).toBe(409);
  expect(refused.json().error).toBe("OVERDRAFT_EXCEEDED");
});

test("fixed deposit is locked until the unlock date", async () => {
  await createAccount({
    accountId: "F1001",
    holderName: "Charlie",
    accountType: "fixed_deposit",
    lockPeriodDays: 30,
    initialBalanceCents: 500_000
  });

  const early = await app.inject({
    method: "POST",
    url: "/accounts/F1001/withdraw",
    payload: { amountCents: 100_000 }
  });
  expect(early.statusCode).toBe(409);
  expect(early.json().error).toBe("LOCK_PERIOD_ACTIVE");

  nowValue = new Date("2024-02-01T00:00:00Z");
  const later = await app.inject({
    method: "POST",
    url: "/accounts/F1001/withdraw",
    payload: { amountCents: 100_000 }
  });
  expect(later.statusCode).toBe(200);
  expect(later.json().balanceCents).toBe(400_000);
});

test("account details include the description", async () => {
  await createAccount({
    accountId: "F1001",
    holderName: "Charlie",
    accountType: "fixed_deposit",
    lockPeriodDays: 30,
    initialBalanceCents: 500_000
  });

  const res = await app.inject({ method: "GET", url: "/accounts/F1001" });
  expect(res.statusCode).toBe(200);
  expect(res.json()).toEqual({
    accountId: "F1001",
    holderName: "Charlie",
    accountType: "fixed_deposit",
    balanceCents: 500_000,
    lockPeriodDays: 30,
    createdAt: "2024-01-01T00:00:00.000Z",
    unlockDate: "2024-01-31",
    description: [
      "Account Number: F1001",
      "Account Holder: Charlie",
      "Balance: $5000.00",
      "Account Type: Fixed Deposit",
      "Unlock Date: 2024-01-31"
    ].join("\n")
  });
});

test("list accounts in the order they were opened", async () => {
  await createAccount({ accountId: "B2", accountType: "basic" });
  await createAccount({ accountId: "B1", accountType: "basic" });

  const res = await app.inject({ method: "GET", url: "/accounts" });
  expect(res.statusCode).toBe(200);
  expect(res.json().accounts.map((a: { accountId: string }) => a.accountId)).toEqual([
    "B2",
    "B1"
  ]);
});

test("interest on a non-savings account is rejected", async () => {
  await createAccount({ accountId: "B1", accountType: "basic" });
  const res = await app.inject({ method: "POST", url: "/accounts/B1/interest" });
  expect(res.statusCode).toBe(409);
  expect(res.json().error).toBe("UNSUPPORTED_OPERATION");
});

test("unknown account returns 404", async () => {
  const res = await app.inject({ method: "GET", url: "/accounts/NOPE/balance" });
  expect(res.statusCode).toBe(404);
  expect(res.json()).toEqual({
    error: "ACCOUNT_NOT_FOUND",
    message: "Account NOPE not found"
  });
});

test("zero or negative amounts return 400 invalid amount", async () => {
  await createAccount({ accountId: "B1", accountType: "basic" });

  for (const [path, amountCents] of [
    ["deposit", 0],
    ["withdraw", 0],
    ["deposit", -1],
    ["withdraw", -1]
  ] as const) {
    const res = await app.inject({
      method: "POST",
      url: `/accounts/B1/${path}`,
      payload: { amountCents }
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("INVALID_AMOUNT");
  }

  const balance = await app.inject({ method: "GET", url: "/accounts/B1/balance" });
  expect(balance.json().balanceCents).toBe(100_000);
});

test("missing amount is a request validation error", async () => {
  await createAccount({ accountId: "B1", accountType: "basic" });
  const res = await app.inject({
    method: "POST",
    url: "/accounts/B1/deposit",
    payload: {}
  });
  expect(res.statusCode).toBe(400);
  expect(res.json().error).toBe("INVALID_REQUEST");
});

test("transfer moves funds between accounts", async () => {
  await createAccount({ accountId: "S1001", accountType: "basic", initialBalanceCents: 135_250 });
  await createAccount({
    accountId: "C1001",
    holderName: "Bob",
    accountType: "current",
    overdraftLimitCents: 50_000,
    initialBalanceCents: 0
  });
  await app.inject({
    method: "POST",
    url: "/accounts/C1001/withdraw",
    payload: { amountCents: 10_000 }
  });

  const res = await app.inject({
    method: "POST",
    url: "/transfers",
    payload: { fromAccountId: "S1001", toAccountId: "C1001", amountCents: 30_000 }
  });
  expect(res.statusCode).toBe(200);
  expect(res.json()).toEqual({
    fromAccountId: "S1001",
    toAccountId: "C1001",
    amountCents: 30_000,
    fromBalanceCents: 105_250,
    toBalanceCents: 20_000,
    message: "Transferred $300.00 from Alice to Bob"
  });
});

test("transfer with an unknown account returns 404 and changes nothing", async () => {
  await createAccount({ accountId: "B1", accountType: "basic" });
  const res = await app.inject({
    method: "POST",
    url: "/transfers",
    payload: { fromAccountId: "B1", toAccountId: "GHOST", amountCents: 100 }
  });
  expect(res.statusCode).toBe(404);
  expect(res.json().error).toBe("ACCOUNT_NOT_FOUND");

  const balance = await app.inject({ method: "GET", url: "/accounts/B1/balance" });
  expect(balance.json().balanceCents).toBe(100_000);
});

test("unknown route returns 404", async () => {
  const res = await app.inject({ method: "GET", url: "/nowhere" });
  expect(res.statusCode).toBe(404);
  expect(res.json().error).toBe("NOT_FOUND");
});
