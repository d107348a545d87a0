import { afterEach, describe, expect, it } from "vitest";
import {
  getTransactionConfig,
  getTransactionConfigurations,
  resetTransactionConfigurations,
  setTransactionConfigurations,
} from "../../../src/config";

describe("transaction configurations", () => {
  afterEach(() => {
    resetTransactionConfigurations();
  });

  it("should start from the defaults", () => {
    expect(getTransactionConfigurations()).toEqual({
      isolationLevel: "read committed",
      ambientIsolationLevel: "serializable",
      asyncFlow: false,
      escalationPolicy: "allow",
    });
  });

  it("should merge partial configurations", () => {
    setTransactionConfigurations({ asyncFlow: true });
    setTransactionConfigurations({ escalationPolicy: "reject" });

    expect(getTransactionConfig("asyncFlow")).toBe(true);
    expect(getTransactionConfig("escalationPolicy")).toBe("reject");
    expect(getTransactionConfig("isolationLevel")).toBe("read committed");
  });

  it("should restore the defaults on reset", () => {
    setTransactionConfigurations({ connectionString: "Data Source=test.db" });
    resetTransactionConfigurations();

    expect(getTransactionConfig("connectionString")).toBeUndefined();
  });
});
