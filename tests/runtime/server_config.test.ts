import test from "node:test";
import assert from "node:assert/strict";
import { ConfigurationError } from "../../src/core/errors/errors";
import { resolveServerConfig } from "../../runtime/config/server.config";

test("defaults apply when nothing is set", () => {
  assert.deepEqual(resolveServerConfig({}, {}), {
    transport: "streamable-http",
    host: "127.0.0.1",
    port: 8766,
  });
});

test("environment variables are read and normalized", () => {
  assert.deepEqual(
    resolveServerConfig(
      {},
      { SESSION_MCP_TRANSPORT: " STDIO ", SESSION_MCP_HOST: "0.0.0.0", SESSION_MCP_PORT: "9000" }
    ),
    { transport: "stdio", host: "0.0.0.0", port: 9000 }
  );
});

test("flags win over environment variables", () => {
  assert.deepEqual(
    resolveServerConfig(
      { transport: "streamable-http", port: "9100" },
      { SESSION_MCP_TRANSPORT: "stdio", SESSION_MCP_PORT: "9000", SESSION_MCP_HOST: "localhost" }
    ),
    { transport: "streamable-http", host: "localhost", port: 9100 }
  );
  assert.equal(resolveServerConfig({ port: 0 }, { SESSION_MCP_PORT: "9000" }).port, 0);
});

test("blank values fall back to the defaults", () => {
  assert.deepEqual(resolveServerConfig({ host: " " }, { SESSION_MCP_PORT: "  " }), {
    transport: "streamable-http",
    host: "127.0.0.1",
    port: 8766,
  });
});

test("invalid values raise ConfigurationError", () => {
  assert.throws(() => resolveServerConfig({ transport: "sse" }, {}), ConfigurationError);
  assert.throws(() => resolveServerConfig({ transport: "sse" }, {}), {
    message: "CONFIGURATION_ERROR unsupported transport='sse'. expected one of: stdio|streamable-http",
  });
  assert.throws(() => resolveServerConfig({}, { SESSION_MCP_PORT: "http" }), {
    message: "CONFIGURATION_ERROR port must be an integer in 0..65535, got 'http'",
  });
  assert.throws(() => resolveServerConfig({ port: "70000" }, {}), {
    message: "CONFIGURATION_ERROR port must be an integer in 0..65535, got '70000'",
  });
});
