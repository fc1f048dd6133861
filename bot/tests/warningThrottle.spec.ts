import { describe, it, expect, beforeEach } from "vitest";
import { WarningThrottle } from "../src/warningThrottle";

describe("WarningThrottle", () => {
  let throttle: WarningThrottle;
  const t0 = new Date(2024, 0, 15, 10, 5).getTime();

  beforeEach(() => {
    throttle = new WarningThrottle(15_000);
  });

  it("suppresses inside the window and allows after it", () => {
    expect(throttle.shouldWarn(-1, 7, t0)).toBe(true);
    throttle.markWarned(-1, 7, t0);

    expect(throttle.shouldWarn(-1, 7, t0 + 14_999)).toBe(false);
    expect(throttle.shouldWarn(-1, 7, t0 + 15_000)).toBe(true);
  });

  it("tracks users and chats separately", () => {
    throttle.markWarned(-1, 7, t0);

    expect(throttle.shouldWarn(-1, 8, t0)).toBe(true);
    expect(throttle.shouldWarn(-2, 7, t0)).toBe(true);
  });

  it("accepts a per-call window", () => {
    throttle.markWarned(-1, 7, t0);
    expect(throttle.shouldWarn(-1, 7, t0 + 60_000, 120_000)).toBe(false);
  });

  it("prunes stale entries when marking", () => {
    throttle.markWarned(-1, 7, t0);
    throttle.markWarned(-1, 8, t0 + 1_000);
    throttle.markWarned(-1, 9, t0 + 15_500);

    expect(throttle.size).toBe(2);
    throttle.reset();
    expect(throttle.size).toBe(0);
  });
});
