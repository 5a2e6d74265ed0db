import { describe, it, expect, vi, afterEach } from "vitest";

import {
  loadClinicConfig,
  parseClinicConfig,
  configFromEnv,
  getConnectionConfig,
} from "./clinic-config.ts";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("loadClinicConfig", () => {
  it("fills every default from an empty object", () => {
    const config = loadClinicConfig();

    expect(config.database).toEqual({
      host: "localhost",
      port: 5432,
      name: "clinic_management",
      user: "clinic",
      password: "clinic",
      poolMax: 20,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
    });
    expect(config.seed).toEqual({ userPassword: "change-me", includeSamplePatient: true });
  });

  it("coerces numeric strings", () => {
    const config = loadClinicConfig({ database: { port: "6543", poolMax: "5" } });

    expect(config.database.port).toBe(6543);
    expect(config.database.poolMax).toBe(5);
  });

  it("falls back to defaults and warns on invalid input", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const config = loadClinicConfig({ database: { port: "not-a-port" } });

    expect(config.database.port).toBe(5432);
    expect(warn).toHaveBeenCalledOnce();
    expect(warn.mock.calls[0]?.[0]).toBe("[clinic:config] Invalid clinic config, using defaults:");
  });
});

describe("parseClinicConfig", () => {
  it("returns the parsed config for valid input", () => {
    expect(parseClinicConfig({ database: { name: "clinic_staging" } }).database.name).toBe(
      "clinic_staging",
    );
  });

  it("throws with the offending path instead of falling back", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(() => parseClinicConfig({ database: { port: "not-a-port" } })).toThrow(
      /^Invalid clinic config: database\.port: /,
    );
    expect(warn).not.toHaveBeenCalled();
  });
});

describe("configFromEnv", () => {
  it("maps CLINIC_DB_* variables and skips empty ones", () => {
    const raw = configFromEnv({
      CLINIC_DB_HOST: "db.internal",
      CLINIC_DB_PORT: "5433",
      CLINIC_DB_NAME: "",
      CLINIC_SEED_PASSWORD: "test-secret",
    });

    expect(raw).toEqual({
      database: { host: "db.internal", port: "5433" },
      seed: { userPassword: "test-secret" },
    });
  });
});

describe("getConnectionConfig", () => {
  it("builds a pool config from the environment", () => {
    const config = getConnectionConfig({
      CLINIC_DB_HOST: "db.internal",
      CLINIC_DB_USER: "clinic_app",
      CLINIC_DB_POOL_MAX: "8",
    });

    expect(config).toEqual({
      host: "db.internal",
      port: 5432,
      database: "clinic_management",
      user: "clinic_app",
      password: "clinic",
      max: 8,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
    });
  });

  it("refuses to fall back when one variable is invalid", () => {
    expect(() =>
      getConnectionConfig({
        CLINIC_DB_HOST: "db.internal",
        CLINIC_DB_NAME: "clinic_staging",
        CLINIC_DB_POOL_MAX: "0",
      }),
    ).toThrow("Invalid clinic config: database.poolMax: Number must be greater than 0");
  });
});
