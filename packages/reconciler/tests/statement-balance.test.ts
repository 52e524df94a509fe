import { describe, it, expect } from "vitest";
import { verifyStatementBalance } from "../src/statement-balance.js";
import type { TransactionInput } from "../src/types.js";
import { usd } from "./fixtures.js";

const movements: TransactionInput[] = [
  { id: "t1", txnDate: "2025-03-01", money: usd("250.00"), direction: "in", description: "Deposit" },
  { id: "t2", txnDate: "2025-03-02", money: usd("100.00"), direction: "out", description: "Rent" },
];

describe("verifyStatementBalance", () => {
  it("passes when opening + movements equals closing", () => {
    expect(verifyStatementBalance(usd("1000.00"), usd("1150.00"), movements)).toEqual({
      passed: true,
      expectedClosing: "1150.00",
      actualClosing: "1150.00",
      difference: "0.00",
    });
  });

  it("tolerates one cent", () => {
    const result = verifyStatementBalance(usd("1000.00"), usd("1150.01"), movements);
    expect(result.passed).toBe(true);
    expect(result.difference).toBe("-0.01");
  });

  it("fails beyond one cent", () => {
    const result = verifyStatementBalance(usd("1000.00"), usd("1150.02"), movements);
    expect(result.passed).toBe(false);
    expect(result.difference).toBe("-0.02");
  });
});
