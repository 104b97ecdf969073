import { afterEach, describe, expect, it, vi } from "vitest";

import { HealthController } from "./health.controller";

describe("HealthController", () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("reports liveness with a timestamp", () => {
    vi.useFakeTimers();
    vi.setSystemTime(Date.UTC(2024, 5, 1, 12));
    vi.spyOn(process, "uptime").mockReturnValue(42.4);

    expect(new HealthController().getHealth()).toEqual({ ok: true, ts: "2024-06-01T12:00:00.000Z", uptimeSeconds: 42 });
  });
});
