import { FastifyInstance } from "fastify";
import { AccountsController } from "./controller";
import {
  accountParamsSchema,
  amountBodySchema,
  createAccountBodySchema,
  transferBodySchema
} from "./schemas";

const accountSchema = {
  type: "object",
  properties: {
    accountId: { type: "string" },
    holderName: { type: "string" },
    accountType: { type: "string" },
    balanceCents: { type: "integer" },
    interestRatePercent: { type: "number" },
    overdraftLimitCents: { type: "integer" },
    lockPeriodDays: { type: "integer" },
    createdAt: { type: "string" },
    unlockDate: { type: "string" }
  },
  required: ["accountId", "holderName", "accountType", "balanceCents"]
};

const accountDetailsSchema = {
  ...accountSchema,
  properties: {
    ...accountSchema.properties,
    description: { type: "string" }
  },
  required: [...accountSchema.required, "description"]
};

const operationSchema = {
  type: "object",
  properties: {
    accountId: { type: "string" },
    balanceCents: { type: "integer" },
    message: { type: "string" }
  },
  required: ["accountId", "balanceCents", "message"]
};

const idParams = {
  type: "object",
  properties: { id: { type: "string" } },
  required: ["id"]
};

const amountBody = {
  type: "object",
  properties: { amountCents: { type: "integer" } },
  required: ["amountCents"]
};

export function registerAccountsRoutes(
  app: FastifyInstance,
  controller: AccountsController
) {
  app.post(
    "/accounts",
    {
      schema: {
        tags: ["accounts"],
        summary: "Open account",
        body: {
          type: "object",
          properties: {
            accountId: { type: "string" },
            holderName: { type: "string" },
            accountType: {
              type: "string",
              enum: ["basic", "savings", "current", "fixed_deposit"]
            },
            initialBalanceCents: { type: "integer", minimum: 0 },
            interestRatePercent: { type: "number" },
            overdraftLimitCents: { type: "integer", minimum: 0 },
            lockPeriodDays: { type: "integer", minimum: 0 }
          },
          required: ["accountId", "holderName", "accountType"]
        },
        response: { 201: accountSchema }
      }
    },
    async (request, reply) => {
      const body = createAccountBodySchema.parse(request.body);
      const account = controller.createAccount(body);
      return reply.status(201).send(account);
    }
  );

  app.get(
    "/accounts",
    {
      schema: {
        tags: ["accounts"],
        summary: "List accounts",
        response: {
          200: {
            type: "object",
            properties: { accounts: { type: "array", items: accountSchema } },
            required: ["accounts"]
          }
        }
      }
    },
    async () => controller.listAccounts()
  );

  app.get(
    "/accounts/:id",
    {
      schema: {
        tags: ["accounts"],
        summary: "Describe account",
        params: idParams,
        response: { 200: accountDetailsSchema }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      return controller.getAccount(params.id);
    }
  );

  app.get(
    "/accounts/:id/balance",
    {
      schema: {
        tags: ["accounts"],
        summary: "Get balance",
        params: idParams,
        response: {
          200: {
            type: "object",
            properties: {
              accountId: { type: "string" },
              balanceCents: { type: "integer" }
            },
            required: ["accountId", "balanceCents"]
          }
        }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      return controller.getBalance(params.id);
    }
  );

  app.post(
    "/accounts/:id/deposit",
    {
      schema: {
        tags: ["accounts"],
        summary: "Deposit funds",
        params: idParams,
        body: amountBody,
        response: { 200: operationSchema }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      const body = amountBodySchema.parse(request.body);
      return controller.deposit(params.id, body.amountCents);
    }
  );

  app.post(
    "/accounts/:id/withdraw",
    {
      schema: {
        tags: ["accounts"],
        summary: "Withdraw funds",
        params: idParams,
        body: amountBody,
        response: { 200: operationSchema }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      const body = amountBodySchema.parse(request.body);
      return controller.withdraw(params.id, body.amountCents);
    }
  );

  app.post(
    "/accounts/:id/interest",
    {
      schema: {
        tags: ["accounts"],
        summary: "Apply interest to a savings account",
        params: idParams,
        response: { 200: operationSchema }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      return controller.applyInterest(params.id);
    }
  );

  app.post(
    "/transfers",
    {
      schema: {
        tags: ["transfers"],
        summary: "Transfer funds between accounts",
        body: {
          type: "object",
          properties: {
            fromAccountId: { type: "string" },
            toAccountId: { type: "string" },
            amountCents: { type: "integer" }
          },
          required: ["fromAccountId", "toAccountId", "amountCents"]
        },
        response: {
          200: {
            type: "object",
            properties: {
              fromAccountId: { type: "string" },
              toAccountId: { type: "string" },
              amountCents: { type: "integer" },
              fromBalanceCents: { type: "integer" },
              toBalanceCents: { type: "integer" },
              message: { type: "string" }
            },
            required: [
              "fromAccountId",
              "toAccountId",
              "amountCents",
              "fromBalanceCents",
              "toBalanceCents",
              "message"
            ]
          }
        }
      }
    },
    async (request) => {
      const body = transferBodySchema.parse(request.body);
      return controller.transfer(body.fromAccountId, body.toAccountId, body.amountCents);
    }
  );
}
