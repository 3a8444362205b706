import { describe, expect, it } from "vitest";
import { ManualClock } from "../core/Clock.js";
import { ScreenShake } from "./ScreenShake.js";

describe("ScreenShake", () => {
  it("has no offset before any trigger", () => {
    const shake = new ScreenShake(new ManualClock(1000));
    expect(shake.offset()).toEqual({ dx: 0, dy: 0 });
    expect(shake.current).toBeNull();
  });

  it("a stronger request overrides a decaying weaker one", () => {
    const clock = new ManualClock(1000);
    const shake = new ScreenShake(clock);
    expect(shake.trigger(2, 100)).toBe(true);
    clock.advance(20);
    expect(shake.trigger(5, 200)).toBe(true);
    expect(shake.current).toEqual({ intensity: 5, startTime: 1020, endTime: 1220 });
  });

  it("a weaker request leaves a strong shake unchanged", () => {
    const clock = new ManualClock(1000);
    const shake = new ScreenShake(clock);
    shake.trigger(5, 200);
    clock.advance(10);
    expect(shake.trigger(1, 50)).toBe(false);
    expect(shake.current).toEqual({ intensity: 5, startTime: 1000, endTime: 1200 });
  });

  it("an equal request is a no-op at the start of the window", () => {
    const clock = new ManualClock(0);
    const shake = new ScreenShake(clock);
    shake.trigger(3, 100);
    expect(shake.trigger(3, 500)).toBe(false);
    expect(shake.current?.endTime).toBe(100);
  });

  it("a request beats the decayed remainder, not the original intensity", () => {
    const clock = new ManualClock(0);
    const shake = new ScreenShake(clock);
    shake.trigger(4, 100);
    clock.set(75);
    // remaining = 4 * (1 - 0.75) = 1
    expect(shake.remainingIntensity()).toBeCloseTo(1, 10);
    expect(shake.trigger(1.5, 100)).toBe(true);
  });

  it("ignores non-positive intensity or duration", () => {
    const shake = new ScreenShake(new ManualClock(0));
    expect(shake.trigger(0, 100)).toBe(false);
    expect(shake.trigger(3, 0)).toBe(false);
    expect(shake.trigger(Number.NaN, 100)).toBe(false);
    expect(shake.current).toBeNull();
  });

  it("offset follows the two sine waves scaled by the decay", () => {
    const clock = new ManualClock(0);
    const shake = new ScreenShake(clock);
    shake.trigger(10, 1000);
    clock.set(100);
    const decay = 0.9;
    const t = 100 * 0.001 * 35;
    const o = shake.offset();
    expect(o.dx).toBeCloseTo(Math.sin(t) * 10 * decay, 10);
    expect(o.dy).toBeCloseTo(Math.sin(t * 1.3 + 1.7) * 10 * decay * 0.7, 10);
  });

  it("is deterministic for the same elapsed time", () => {
    const clock = new ManualClock(0);
    const shake = new ScreenShake(clock);
    shake.trigger(6, 400);
    clock.set(123);
    const a = shake.offset();
    const b = shake.offset();
    expect(a).toEqual(b);
  });

  it("returns zero once the window has elapsed", () => {
    const clock = new ManualClock(0);
    const shake = new ScreenShake(clock);
    shake.trigger(6, 400);
    clock.set(400);
    expect(shake.offset()).toEqual({ dx: 0, dy: 0 });
    expect(shake.remainingIntensity()).toBe(0);
  });

  it("reset drops the active shake", () => {
    const clock = new ManualClock(0);
    const shake = new ScreenShake(clock);
    shake.trigger(6, 400);
    shake.reset();
    expect(shake.offset()).toEqual({ dx: 0, dy: 0 });
  });
});
