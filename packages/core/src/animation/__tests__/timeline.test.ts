import { assert, assertClose, describe, test } from "@arcflow/testkit";
import { clamp01, interpolateNumber, normalizeDurationMs } from "../interpolate.js";
import { createKeyframeTimeline, normalizeCurve, sampleCurve } from "../timeline.js";

describe("animation/interpolate", () => {
  test("clamp01 clamps non-finite and out-of-range values", () => {
    assert.equal(clamp01(Number.NaN), 0);
    assert.equal(clamp01(Number.POSITIVE_INFINITY), 0);
    assert.equal(clamp01(-0.5), 0);
    assert.equal(clamp01(0.25), 0.25);
    assert.equal(clamp01(2), 1);
  });

  test("normalizeDurationMs truncates to whole milliseconds", () => {
    assert.equal(normalizeDurationMs(undefined, 1333), 1333);
    assert.equal(normalizeDurationMs(Number.POSITIVE_INFINITY, 0), 0);
    assert.equal(normalizeDurationMs(-1, 1333), 0);
    assert.equal(normalizeDurationMs(666.5, 1333), 666);
  });

  test("interpolateNumber clamps progress before interpolating", () => {
    assert.equal(interpolateNumber(10, 30, -1), 10);
    assert.equal(interpolateNumber(10, 30, 0.5), 20);
    assert.equal(interpolateNumber(10, 30, 2), 30);
  });
});

describe("animation/curve", () => {
  test("normalizeCurve rejects empty, unordered, and non-finite curves", () => {
    assert.throws(() => normalizeCurve([]), {
      name: "RingError",
      code: "RING_INVALID_PLAN",
      message: "keyframe curve must not be empty",
    });
    assert.throws(
      () =>
        normalizeCurve([
          { fraction: 0.5, value: 1 },
          { fraction: 0.2, value: 2 },
        ]),
      { code: "RING_INVALID_PLAN", message: "keyframe 1 fraction is out of order" },
    );
    assert.throws(() => normalizeCurve([{ fraction: 1.5, value: 0 }]), {
      message: "keyframe 0 fraction must be within [0, 1]",
    });
    assert.throws(() => normalizeCurve([{ fraction: 0, value: Number.NaN }]), {
      message: "keyframe 0 value must be finite",
    });
  });

  test("normalizeCurve freezes keyframes and records endpoints", () => {
    const curve = normalizeCurve([
      { fraction: 0, value: 3 },
      { fraction: 1, value: 9 },
    ]);
    assert.equal(curve.initialValue, 3);
    assert.equal(curve.finalValue, 9);
    assert.equal(Object.isFrozen(curve.keyframes), true);
    assert.equal(Object.isFrozen(curve.keyframes[0]), true);
  });

  test("sampleCurve interpolates linearly between keyframes", () => {
    const curve = normalizeCurve([
      { fraction: 0, value: 0 },
      { fraction: 0.5, value: 10 },
      { fraction: 1, value: 20 },
    ]);
    assert.equal(sampleCurve(curve, 0.25), 5);
    assert.equal(sampleCurve(curve, 0.5), 10);
    assert.equal(sampleCurve(curve, 0.75), 15);
    assert.equal(sampleCurve(curve, -1), 0);
    assert.equal(sampleCurve(curve, 2), 20);
  });

  test("sampleCurve holds the first value before a late first keyframe", () => {
    const curve = normalizeCurve([
      { fraction: 0.4, value: 2 },
      { fraction: 1, value: 8 },
    ]);
    assert.equal(sampleCurve(curve, 0.1), 2);
    assertClose(sampleCurve(curve, 0.7), 5);
  });

  test("sampleCurve steps at a repeated fraction", () => {
    const curve = normalizeCurve([
      { fraction: 0, value: 0 },
      { fraction: 0.5, value: 2 },
      { fraction: 0.5, value: 8 },
      { fraction: 1, value: 10 },
    ]);
    assert.equal(sampleCurve(curve, 0.5), 2);
    assertClose(sampleCurve(curve, 0.6), 8.4);
  });
});

describe("animation/timeline", () => {
  const curve = [
    { fraction: 0, value: 1 },
    { fraction: 1, value: 3 },
  ];

  test("holds its initial value until started", () => {
    const timeline = createKeyframeTimeline(7);
    assert.equal(timeline.value(), 7);
    assert.equal(timeline.advance(10), 7);
    assert.equal(timeline.isRunning(), false);
  });

  test("advance interpolates and completes once", () => {
    const timeline = createKeyframeTimeline();
    let completions = 0;
    timeline.onComplete = () => {
      completions++;
    };
    timeline.start(curve, 100);
    assert.equal(timeline.value(), 1);
    assert.equal(timeline.advance(25), 1.5);
    assert.equal(timeline.advance(25), 2);
    assert.equal(timeline.isRunning(), true);
    assert.equal(timeline.advance(80), 3);
    assert.equal(timeline.isRunning(), false);
    assert.equal(timeline.advance(10), 3);
    assert.equal(completions, 1);
  });

  test("zero and negative durations finish on the first advance", () => {
    const timeline = createKeyframeTimeline();
    timeline.start(curve, 0);
    assert.equal(timeline.value(), 1);
    assert.equal(timeline.advance(0), 3);
    assert.equal(timeline.isRunning(), false);

    timeline.start(curve, -50);
    assert.equal(timeline.advance(0), 3);
    assert.equal(timeline.isRunning(), false);

    timeline.start(curve, Number.NaN);
    assert.equal(timeline.advance(0), 3);
    assert.equal(timeline.isRunning(), false);
  });

  test("truncates fractional durations", () => {
    const timeline = createKeyframeTimeline();
    timeline.start(curve, 100.9);
    assert.equal(timeline.advance(50), 2);
    assert.equal(timeline.advance(50), 3);
    assert.equal(timeline.isRunning(), false);
  });

  test("ignores negative and non-finite elapsed time", () => {
    const timeline = createKeyframeTimeline();
    timeline.start(curve, 100);
    assert.equal(timeline.advance(-40), 1);
    assert.equal(timeline.advance(Number.NaN), 1);
    assert.equal(timeline.isRunning(), true);
  });

  test("cancel stops in place without completing", () => {
    const timeline = createKeyframeTimeline();
    let completions = 0;
    timeline.onComplete = () => {
      completions++;
    };
    timeline.start(curve, 100);
    timeline.advance(50);
    timeline.cancel();
    assert.equal(timeline.value(), 2);
    assert.equal(timeline.isRunning(), false);
    assert.equal(timeline.advance(50), 2);
    assert.equal(completions, 0);
  });

  test("end jumps to the final value and completes once", () => {
    const timeline = createKeyframeTimeline();
    let completions = 0;
    timeline.onComplete = () => {
      completions++;
    };
    timeline.start(curve, 100);
    timeline.advance(10);
    timeline.end();
    assert.equal(timeline.value(), 3);
    assert.equal(timeline.isRunning(), false);
    timeline.end();
    assert.equal(completions, 1);
  });

  test("restarting replaces the curve and resets elapsed time", () => {
    const timeline = createKeyframeTimeline();
    timeline.start(curve, 100);
    timeline.advance(90);
    timeline.start(
      [
        { fraction: 0, value: 10 },
        { fraction: 1, value: 20 },
      ],
      100,
    );
    assert.equal(timeline.value(), 10);
    assert.equal(timeline.advance(50), 15);
  });
});
