import { type ExecutionContext, UnauthorizedException } from "@nestjs/common";
import { describe, expect, it } from "vitest";

import type { ConfigService } from "../config/config.service";
import { parseAppConfig } from "../config/config.service";
import { ApiKeyGuard } from "./api-key.guard";

function createGuard(env: Record<string, string>): ApiKeyGuard {
  const config = parseAppConfig(env);
  return new ApiKeyGuard({ load: () => config } as unknown as ConfigService);
}

function contextFor(path: string, headers: Record<string, string> = {}): ExecutionContext {
  const req = {
    path,
    url: path,
    header: (name: string) => headers[name.toLowerCase()]
  };
  return {
    switchToHttp: () => ({ getRequest: () => req })
  } as unknown as ExecutionContext;
}

const API_KEY = "test-secret-key-0001";

describe("ApiKeyGuard", () => {
  it("leaves every route open when no key is configured", () => {
    expect(createGuard({}).canActivate(contextFor("/bot/status"))).toBe(true);
  });

  it("never guards the health probe", () => {
    expect(createGuard({ API_KEY }).canActivate(contextFor("/health"))).toBe(true);
  });

  it("accepts the configured key", () => {
    expect(createGuard({ API_KEY }).canActivate(contextFor("/bot/start", { "x-api-key": API_KEY }))).toBe(true);
  });

  it("rejects missing and wrong keys", () => {
    const guard = createGuard({ API_KEY });
    expect(() => guard.canActivate(contextFor("/bot/stop"))).toThrow(UnauthorizedException);
    expect(() => guard.canActivate(contextFor("/bot/stop", { "x-api-key": "nope" }))).toThrow("Invalid API key.");
  });
});
