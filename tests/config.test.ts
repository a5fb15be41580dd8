import test from "node:test";
import assert from "node:assert/strict";
import { loadConfig } from "../src/config.js";
import { ValidationError } from "../src/errors.js";

test("defaults apply when nothing is set", () => {
  assert.deepEqual(loadConfig({}), { dbPath: "components.db", logLevel: "info", autoCategorize: false });
});

test("reads and normalizes provided values", () => {
  assert.deepEqual(
    loadConfig({ CATALOG_DB_PATH: " /data/lab.db ", CATALOG_LOG_LEVEL: "debug", CATALOG_AUTO_CATEGORIZE: "Yes" }),
    { dbPath: "/data/lab.db", logLevel: "debug", autoCategorize: true }
  );
});

test("rejects unknown log levels and flag values", () => {
  assert.throws(
    () => loadConfig({ CATALOG_LOG_LEVEL: "loud", CATALOG_AUTO_CATEGORIZE: "maybe" }),
    (err: unknown) =>
      err instanceof ValidationError &&
      err.issues.map((i) => i.field).join(",") === "CATALOG_LOG_LEVEL,CATALOG_AUTO_CATEGORIZE"
  );
});
