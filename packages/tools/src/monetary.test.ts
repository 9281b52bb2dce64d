import { describe, it, expect } from "vitest";
import { extractMonetaryValues } from "./monetary.js";

describe("extractMonetaryValues", () => {
  it("captures the marker together with the amount", () => {
    expect(extractMonetaryValues("Tenant shall pay $2,500.00 per month.")).toEqual(["$2,500.00"]);
  });

  it("recognises every supported marker", () => {
    const text = "Fees: USD 1,000, € 250.50, EUR 75, £3,000,000.99 and $40.";

    expect(extractMonetaryValues(text)).toEqual([
      "USD 1,000",
      "€ 250.50",
      "EUR 75",
      "£3,000,000.99",
      "$40",
    ]);
  });

  it("accepts plain digit runs without thousands separators", () => {
    expect(extractMonetaryValues("a deposit of $12000 is due")).toEqual(["$12000"]);
  });

  it("returns matches in first-occurrence order without duplicates", () => {
    const text = "Late fee $50. Deposit $1,000. A second late fee of $50 applies.";

    expect(extractMonetaryValues(text)).toEqual(["$50", "$1,000"]);
  });

  it("ignores currency codes embedded in words", () => {
    expect(extractMonetaryValues("XUSD 500 and EUROPE 20")).toEqual([]);
  });

  it("returns an empty array when there are no amounts", () => {
    expect(extractMonetaryValues("No payment terms here.")).toEqual([]);
  });
});
