import { describe, it, expect } from "vitest";
import type { IncomingHttpHeaders } from "node:http";
import { authenticateRequest, AuthError } from "../middleware.js";
import { loadConfig } from "../../config.js";

const config = loadConfig({ API_TOKEN: "test-secret" });

function request(headers: IncomingHttpHeaders) {
  return { headers };
}

describe("authenticateRequest", () => {
  it("returns the user id for a valid token", () => {
    const req = request({ authorization: "Bearer test-secret", "x-user-id": " user-42 " });
    expect(authenticateRequest(req, config)).toBe("user-42");
  });

  it("rejects a missing Authorization header", () => {
    expect(() => authenticateRequest(request({ "x-user-id": "user-42" }), config)).toThrow(
      "Missing or invalid Authorization header"
    );
  });

  it("rejects a wrong token", () => {
    const req = request({ authorization: "Bearer wrong-secret", "x-user-id": "user-42" });
    expect(() => authenticateRequest(req, config)).toThrow(AuthError);
  });

  it("rejects a missing user id", () => {
    const req = request({ authorization: "Bearer test-secret" });
    expect(() => authenticateRequest(req, config)).toThrow("Missing X-User-Id header");
  });

  it("rejects every request when no token is configured", () => {
    const req = request({ authorization: "Bearer test-secret", "x-user-id": "user-42" });
    expect(() => authenticateRequest(req, loadConfig({}))).toThrow(AuthError);
  });

  it("uses DEV_USER_ID outside production", () => {
    expect(authenticateRequest(request({}), loadConfig({ DEV_USER_ID: "dev-user" }))).toBe("dev-user");
  });

  it("ignores DEV_USER_ID in production", () => {
    const prod = loadConfig({ DEV_USER_ID: "dev-user", NODE_ENV: "production", API_TOKEN: "test-secret" });
    expect(() => authenticateRequest(request({}), prod)).toThrow(AuthError);
  });
});
