import type { OpenAPIV3 } from "openapi-types";

function jsonContent(ref: string) {
  return {
    "application/json": {
      schema: { $ref: `#/components/schemas/${ref}` }
    }
  };
}

function ok(ref: string, status = "200"): OpenAPIV3.ResponsesObject {
  return {
    [status]: { description: status === "201" ? "Created" : "OK", content: jsonContent(ref) },
    "4XX": { description: "Client error", content: jsonContent("Error") }
  };
}

const accountIdParam: OpenAPIV3.ReferenceObject = {
  $ref: "#/components/parameters/AccountId"
};

export const openapiDocument: OpenAPIV3.Document = {
  openapi: "3.0.3",
  info: {
    title: "Bank Accounts API",
    description: "Basic, savings, current and fixed-deposit accounts with transfers",
    version: "1.0.0"
  },
  paths: {
    "/health": {
      get: { summary: "Health check", responses: ok("Health") }
    },
    "/accounts": {
      post: {
        summary: "Open account",
        requestBody: { required: true, content: jsonContent("CreateAccountBody") },
        responses: ok("Account", "201")
      },
      get: { summary: "List accounts", responses: ok("AccountList") }
    },
    "/accounts/{id}": {
      get: {
        summary: "Describe account",
        parameters: [accountIdParam],
        responses: ok("AccountDetails")
      }
    },
    "/accounts/{id}/balance": {
      get: {
        summary: "Get balance",
        parameters: [accountIdParam],
        responses: ok("Balance")
      }
    },
    "/accounts/{id}/deposit": {
      post: {
        summary: "Deposit funds",
        parameters: [accountIdParam],
        requestBody: { required: true, content: jsonContent("AmountBody") },
        responses: ok("OperationResult")
      }
    },
    "/accounts/{id}/withdraw": {
      post: {
        summary: "Withdraw funds",
        parameters: [accountIdParam],
        requestBody: { required: true, content: jsonContent("AmountBody") },
        responses: ok("OperationResult")
      }
    },
    "/accounts/{id}/interest": {
      post: {
        summary: "Apply interest to a savings account",
        parameters: [accountIdParam],
        responses: ok("OperationResult")
      }
    },
    "/transfers": {
      post: {
        summary: "Transfer funds between accounts",
        requestBody: { required: true, content: jsonContent("TransferBody") },
        responses: ok("TransferResult")
      }
    }
  },
  components: {
    parameters: {
      AccountId: {
        name: "id",
        in: "path",
        required: true,
        schema: { type: "string" }
      }
    },
    schemas: {
      Health: {
        type: "object",
        properties: { status: { type: "string", enum: ["ok"] } },
        required: ["status"]
      },
      Error: {
        type: "object",
        properties: {
          error: { type: "string" },
          message: { type: "string" }
        },
        required: ["error", "message"]
      },
      Account: {
        type: "object",
        properties: {
          accountId: { type: "string" },
          holderName: { type: "string" },
          accountType: {
            type: "string",
            enum: ["basic", "savings", "current", "fixed_deposit"]
          },
          balanceCents: { type: "integer" },
          interestRatePercent: { type: "number" },
          overdraftLimitCents: { type: "integer" },
          lockPeriodDays: { type: "integer" },
          createdAt: { type: "string", format: "date-time" },
          unlockDate: { type: "string", format: "date" }
        },
        required: ["accountId", "holderName", "accountType", "balanceCents"]
      },
      AccountDetails: {
        allOf: [
          { $ref: "#/components/schemas/Account" },
          {
            type: "object",
            properties: { description: { type: "string" } },
            required: ["description"]
          }
        ]
      },
      AccountList: {
        type: "object",
        properties: {
          accounts: { type: "array", items: { $ref: "#/components/schemas/Account" } }
        },
        required: ["accounts"]
      },
      Balance: {
        type: "object",
        properties: {
          accountId: { type: "string" },
          balanceCents: { type: "integer" }
        },
        required: ["accountId", "balanceCents"]
      },
      OperationResult: {
        type: "object",
        properties: {
          accountId: { type: "string" },
          balanceCents: { type: "integer" },
          message: { type: "string" }
        },
        required: ["accountId", "balanceCents", "message"]
      },
      TransferResult: {
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
      },
      CreateAccountBody: {
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
      AmountBody: {
        type: "object",
        properties: { amountCents: { type: "integer", minimum: 1 } },
        required: ["amountCents"]
      },
      TransferBody: {
        type: "object",
        properties: {
          fromAccountId: { type: "string" },
          toAccountId: { type: "string" },
          amountCents: { type: "integer", minimum: 1 }
        },
        required: ["fromAccountId", "toAccountId", "amountCents"]
      }
    }
  }
};
