import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("dotenv", () => ({
  config: () => {
    process.env.APP_ENV = "staging";
    return { parsed: { APP_ENV: "staging" } };
  },
}));

const ORIGINAL_APP_ENV = process.env.APP_ENV;

beforeEach(() => {
  delete process.env.APP_ENV;
});

afterEach(() => {
  if (ORIGINAL_APP_ENV === undefined) {
    delete process.env.APP_ENV;
    return;
  }
  process.env.APP_ENV = ORIGINAL_APP_ENV;
});

describe("package entry", () => {
  it("loads .env before monitoring resolves its environment", async () => {
    vi.resetModules();

    await import("../index");
    const { monitoringConfig } = await import("../shared/config/monitoring");

    expect(process.env.APP_ENV).toBe("staging");
    expect(monitoringConfig.environment).toBe("staging");
  });
});
