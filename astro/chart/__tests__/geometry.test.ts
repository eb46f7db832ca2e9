import { describe, expect, it } from "vitest";
import {
  angularDistance,
  circularGaps,
  clumpCount,
  handleCount,
  isSeesaw,
  largestGap,
  normalizeDegrees,
  span,
} from "../geometry.js";

describe("normalizeDegrees", () => {
  it("wraps negative and oversized values into [0, 360)", () => {
    expect(normalizeDegrees(-30)).toBe(330);
    expect(normalizeDegrees(370.5)).toBe(10.5);
    expect(normalizeDegrees(720)).toBe(0);
  });

  it("never returns -0", () => {
    expect(normalizeDegrees(-360)).toBe(0);
  });
});

describe("angularDistance", () => {
  it("takes the short way around the circle", () => {
    expect(angularDistance(10, 350)).toBe(20);
    expect(angularDistance(0, 180)).toBe(180);
    expect(angularDistance(-90, 90)).toBe(180);
    expect(angularDistance(45, 405)).toBe(0);
  });
});

describe("circularGaps", () => {
  it("sorts and wraps the last gap back to the first point", () => {
    expect(circularGaps([30, 10, 20])).toEqual({
      sorted: [10, 20, 30],
      gaps: [10, 10, 340],
    });
  });

  it("normalizes longitudes before ordering them", () => {
    expect(circularGaps([370, -10, 20])).toEqual({
      sorted: [10, 20, 350],
      gaps: [10, 330, 20],
    });
  });
});

describe("largestGap / span", () => {
  it("treats fewer than two points as unbounded", () => {
    expect(largestGap([])).toBe(360);
    expect(largestGap([42])).toBe(360);
    expect(span([])).toBe(0);
    expect(span([5])).toBe(0);
  });

  it("measures a tight cluster", () => {
    expect(largestGap([0, 10, 20, 30, 40])).toBe(320);
    expect(span([0, 10, 20, 30, 40])).toBe(40);
  });

  it("handles the 0/360 seam", () => {
    expect(largestGap([350, 10])).toBe(340);
    expect(span([350, 10])).toBe(20);
  });

  it("places out-of-range longitudes where they fall on the circle", () => {
    expect(largestGap([0, 200, 370])).toBe(190);
    expect(span([0, 200, 370])).toBe(170);
    expect(clumpCount([0, 200, 370])).toBe(3);
  });

  it("span and largest gap always add up to the full circle", () => {
    const sets = [
      [12.5, 99.1, 200.75],
      [0, 180],
      [359.9, 0.1, 45, 300],
      [10, 10, 10],
      [3, 77, 151, 225, 299, 333.3],
    ];
    for (const lons of sets) {
      expect(span(lons) + largestGap(lons)).toBeCloseTo(360, 9);
    }
  });
});

describe("handleCount", () => {
  it("is zero below three points", () => {
    expect(handleCount([0, 170])).toBe(0);
  });

  it("is zero for a single tight cluster", () => {
    expect(handleCount([0, 10, 20, 30, 40])).toBe(0);
  });

  it("is zero when the chart is evenly spread", () => {
    expect(handleCount([0, 60, 120, 180, 240, 300])).toBe(0);
  });

  it("is zero for a bowl with no clear inner break", () => {
    expect(handleCount([0, 30, 60, 90, 120, 150])).toBe(0);
  });

  it("counts a single isolated planet", () => {
    expect(handleCount([0, 5, 10, 15, 170])).toBe(1);
  });

  it("does not depend on where 0° falls", () => {
    expect(handleCount([190, 195, 200, 205, 0])).toBe(1);
  });

  it("counts a two-planet handle", () => {
    expect(handleCount([0, 5, 10, 15, 20, 150, 160])).toBe(2);
  });

  it("splits at the first of two equally wide inner gaps", () => {
    // Inner gaps of 100° after 10 and after 110: the first split leaves 3 | 5.
    expect(handleCount([0, 5, 10, 110, 210, 215, 220, 225])).toBe(3);
  });

  it("splits out-of-range longitudes like their normalized values", () => {
    expect(handleCount([360, 365, 370, 375, 530])).toBe(1);
  });
});

describe("clumpCount", () => {
  it("returns the point count below two points", () => {
    expect(clumpCount([])).toBe(0);
    expect(clumpCount([7])).toBe(1);
  });

  it("counts the wrap-around gap like any other", () => {
    expect(clumpCount([0, 10, 20])).toBe(2);
  });

  it("finds no breaks in an even spread", () => {
    const lons = Array.from({ length: 12 }, (_, i) => i * 30);
    expect(clumpCount(lons)).toBe(1);
  });

  it("counts three separated groups", () => {
    expect(clumpCount([0, 10, 120, 130, 240, 250])).toBe(4);
  });

  it("honours a custom threshold", () => {
    expect(clumpCount([0, 10, 20], 5)).toBe(4);
  });
});

describe("isSeesaw", () => {
  it("recognises two opposing groups", () => {
    expect(isSeesaw([0, 10, 20, 180, 190, 200])).toBe(true);
  });

  it("needs at least four points", () => {
    expect(isSeesaw([0, 10, 180])).toBe(false);
  });

  it("rejects an even spread", () => {
    const lons = Array.from({ length: 12 }, (_, i) => i * 30);
    expect(isSeesaw(lons)).toBe(false);
  });

  it("rejects a single cluster", () => {
    expect(isSeesaw([0, 10, 20, 30])).toBe(false);
  });

  it("accepts a largest gap of exactly 200°", () => {
    expect(largestGap([0, 2, 157, 160])).toBe(200);
    expect(isSeesaw([0, 2, 157, 160])).toBe(true);
  });

  it("rejects a largest gap just over 200°", () => {
    expect(largestGap([0, 2, 157, 159.5])).toBe(200.5);
    expect(isSeesaw([0, 2, 157, 159.5])).toBe(false);
  });

  it("finds no see-saw at a largest gap of exactly 100°", () => {
    // The gap window admits 100°, but no inner gap can then exceed 150°.
    expect(largestGap([0, 100, 200, 260])).toBe(100);
    expect(isSeesaw([0, 100, 200, 260])).toBe(false);
  });

  it("rejects a split that leaves a lone planet", () => {
    expect(isSeesaw([0, 10, 20, 190])).toBe(false);
  });

  // Known limitation: group centers are arithmetic means, so a group
  // straddling 0° is centred near 180° instead of near 0°.
  it("misjudges a group straddling 0° (arithmetic mean)", () => {
    expect(isSeesaw([350, 355, 5, 10, 170, 175, 185, 190])).toBe(false);
    expect(isSeesaw([10, 15, 25, 30, 190, 195, 205, 210])).toBe(true);
  });
});
