import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    assert.equal(config.PORT, 8787);
    assert.equal(config.SCAN_LOOKBACK_DAYS, 3);
    assert.equal(config.SCAN_CRON, "0 */6 * * *");
    assert.equal(config.SCAN_ON_START, true);
    assert.equal(config.STATUS_MIN_CONFIDENCE, 0.6);
    assert.equal(config.OLLAMA_TIMEOUT_MS, 30000);
    assert.deepEqual(config.mailAccounts, []);
  });

  it("builds a single account from the MAIL_* variables", () => {
    const config = loadConfig({ MAIL_USERNAME: "me@example.com", MAIL_PASSWORD: "test-secret", IMAP_PORT: "143" });

    assert.deepEqual(config.mailAccounts, [
      { username: "me@example.com", password: "test-secret", server: "imap.gmail.com", port: 143 },
    ]);
  });

  it("reads several accounts from MAIL_ACCOUNTS", () => {
    const config = loadConfig({
      MAIL_ACCOUNTS: JSON.stringify([
        { username: "a@example.com", password: "test-secret" },
        { username: "b@example.com", password: "test-secret", server: "imap.example.com", port: "1993" },
      ]),
      MAIL_USERNAME: "ignored@example.com",
      MAIL_PASSWORD: "test-secret",
    });

    assert.deepEqual(config.mailAccounts, [
      { username: "a@example.com", password: "test-secret", server: "imap.gmail.com", port: 993 },
      { username: "b@example.com", password: "test-secret", server: "imap.example.com", port: 1993 },
    ]);
  });

  it("parses boolean flags", () => {
    assert.equal(loadConfig({ SCAN_ON_START: "false" }).SCAN_ON_START, false);
    assert.equal(loadConfig({ OLLAMA_ENABLED: "0" }).OLLAMA_ENABLED, false);
    assert.equal(loadConfig({ OLLAMA_ENABLED: "yes" }).OLLAMA_ENABLED, true);
  });

  it("rejects invalid values", () => {
    assert.throws(() => loadConfig({ PORT: "not-a-port" }), /Invalid environment configuration:\nPORT:/);
    assert.throws(() => loadConfig({ STATUS_MIN_CONFIDENCE: "1.5" }), /STATUS_MIN_CONFIDENCE/);
    assert.throws(() => loadConfig({ MAIL_ACCOUNTS: "{not json" }), /MAIL_ACCOUNTS:/);
    assert.throws(() => loadConfig({ MAIL_ACCOUNTS: '[{"username":"a@example.com"}]' }), /MAIL_ACCOUNTS\.0\.password/);
  });
});
