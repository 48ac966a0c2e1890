import { loadConfig } from "../src/config";

test("defaults apply and tests log nothing", () => {
  const config = loadConfig({ NODE_ENV: "test" });
  expect(config).toEqual({
    NODE_ENV: "test",
    PORT: 3000,
    HOST: "0.0.0.0",
    LOG_LEVEL: "silent",
    RATE_LIMIT_MAX: 100,
    RATE_LIMIT_WINDOW_MS: 60_000,
    BODY_LIMIT_BYTES: 1_048_576
  });
});

test("outside tests the level defaults to info", () => {
  expect(loadConfig({}).LOG_LEVEL).toBe("info");
});

test("values are coerced from strings", () => {
  const config = loadConfig({ PORT: "8080", LOG_LEVEL: "debug", RATE_LIMIT_MAX: "5" });
  expect(config.PORT).toBe(8080);
  expect(config.LOG_LEVEL).toBe("debug");
  expect(config.RATE_LIMIT_MAX).toBe(5);
});

test("invalid values are rejected", () => {
  expect(() => loadConfig({ PORT: "-1" })).toThrow();
  expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow();
});
