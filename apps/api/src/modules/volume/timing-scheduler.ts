import type { StrategySettings } from "@volume-bot/shared";

import { type RandomSource, uniform } from "./random-source";
import { BURST_MODE_INTERVAL_MULTIPLIER, QUIET_MODE_INTERVAL_MULTIPLIER } from "./volume-constants";

export type TimingSettings = Pick<
  StrategySettings,
  "orderFrequencySeconds" | "timingRandomization" | "burstProbability" | "quietProbability"
>;

export class TimingScheduler {
  constructor(
    private readonly settings: TimingSettings,
    private readonly random: RandomSource
  ) {}

  /** Whether enough jittered time has passed since `lastOrderTime` (both epoch ms). */
  isDue(now: number, lastOrderTime: number | null): boolean {
    if (lastOrderTime === null) return true;

    const elapsedSeconds = (now - lastOrderTime) / 1000;
    const { orderFrequencySeconds, timingRandomization, burstProbability, quietProbability } = this.settings;
    let interval = orderFrequencySeconds * (1 + uniform(this.random, -timingRandomization, timingRandomization));

    // Burst wins when both regimes would fire; quiet is only drawn when burst did not.
    if (this.random.next() < burstProbability) {
      interval *= BURST_MODE_INTERVAL_MULTIPLIER;
    } else if (this.random.next() < quietProbability) {
      interval *= QUIET_MODE_INTERVAL_MULTIPLIER;
    }

    return elapsedSeconds >= interval;
  }
}
