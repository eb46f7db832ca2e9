import { describe, expect, it } from "vitest";
import {
  classifyGeometry,
  detectChartShape,
  measureChartGeometry,
  type ChartGeometry,
} from "../detectChartShape.js";
import { SHAPE_BODY_NAMES } from "../../schemas/natalChart.schema.js";

function bodiesAt(longitudes: number[]) {
  return longitudes.map((longitude, i) => ({
    name: SHAPE_BODY_NAMES[i],
    longitude,
  }));
}

function rotate(longitudes: number[], offset: number): number[] {
  return longitudes.map((lon) => (lon + offset) % 360);
}

const CHARTS: Record<string, number[]> = {
  bundle: [0, 10, 20, 30, 40],
  bucket: [0, 5, 10, 15, 170],
  bowl: [0, 30, 60, 90, 120, 150],
  see_saw: [0, 10, 20, 180, 190, 200],
  locomotive: [0, 25, 50, 75, 100, 125, 150, 175, 200, 225],
  splay: [0, 10, 20, 95, 105, 180, 190, 200, 275, 285],
  splash: [0, 36, 72, 108, 144, 180, 216, 252, 288, 324],
};

describe("detectChartShape", () => {
  it("returns null below three canonical bodies", () => {
    expect(detectChartShape([])).toBeNull();
    expect(detectChartShape(bodiesAt([0, 90]))).toBeNull();
  });

  it("ignores bodies outside the canonical ten", () => {
    const bodies = [
      { name: "Sun", longitude: 0 },
      { name: "Moon", longitude: 10 },
      { name: "Chiron", longitude: 20 },
      { name: "True_North_Lunar_Node", longitude: 30 },
    ];
    expect(detectChartShape(bodies)).toBeNull();
  });

  it("matches body names exactly", () => {
    const bodies = [
      { name: "sun", longitude: 0 },
      { name: "moon", longitude: 10 },
      { name: "Mars", longitude: 20 },
    ];
    expect(detectChartShape(bodies)).toBeNull();
  });

  it("classifies a tight cluster as a bundle", () => {
    expect(detectChartShape(bodiesAt(CHARTS.bundle))).toBe("bundle");
  });

  it("classifies a cluster with one isolated planet as a bucket", () => {
    expect(detectChartShape(bodiesAt(CHARTS.bucket))).toBe("bucket");
  });

  it("classifies a half-circle spread as a bowl", () => {
    expect(detectChartShape(bodiesAt(CHARTS.bowl))).toBe("bowl");
  });

  it("classifies two opposing groups as a see-saw", () => {
    expect(detectChartShape(bodiesAt(CHARTS.see_saw))).toBe("see_saw");
  });

  it("classifies a spread with one empty trine as a locomotive", () => {
    expect(detectChartShape(bodiesAt(CHARTS.locomotive))).toBe("locomotive");
  });

  it("accepts a locomotive spanning exactly 200°", () => {
    const lons = [0, 50, 100, 150, 200];
    expect(measureChartGeometry(lons)).toMatchObject({
      span: 200,
      largest_gap: 160,
      handle_count: 0,
      is_seesaw: false,
    });
    expect(detectChartShape(bodiesAt(lons))).toBe("locomotive");
  });

  it("accepts a locomotive spanning exactly 280°", () => {
    const lons = [0, 70, 140, 210, 280];
    expect(measureChartGeometry(lons)).toMatchObject({
      span: 280,
      largest_gap: 80,
    });
    expect(detectChartShape(bodiesAt(lons))).toBe("locomotive");
  });

  it("stops calling it a locomotive past 280°", () => {
    const lons = [0, 70, 140, 210, 281];
    expect(measureChartGeometry(lons).span).toBe(281);
    expect(detectChartShape(bodiesAt(lons))).toBe("splay");
  });

  it("classifies several separated clumps as a splay", () => {
    expect(detectChartShape(bodiesAt(CHARTS.splay))).toBe("splay");
  });

  it("classifies an even spread as a splash", () => {
    expect(detectChartShape(bodiesAt(CHARTS.splash))).toBe("splash");
  });

  it("falls back to splay when no rule matches", () => {
    const lons = [0, 30, 60, 90, 120, 150, 190];
    const geometry = measureChartGeometry(lons);
    expect(geometry.span).toBe(190);
    expect(geometry.clump_count).toBe(2);
    expect(geometry.is_seesaw).toBe(false);
    expect(detectChartShape(bodiesAt(lons))).toBe("splay");
  });

  it("normalizes longitudes from any range", () => {
    expect(detectChartShape(bodiesAt([360, 370, -340, 750, 40]))).toBe("bundle");
  });

  it("is invariant under rotation", () => {
    for (const [shape, lons] of Object.entries(CHARTS)) {
      for (const offset of [37, 90, 181.5, 300]) {
        expect(detectChartShape(bodiesAt(rotate(lons, offset)))).toBe(shape);
      }
    }
  });

  it("is invariant under permutation", () => {
    for (const [shape, lons] of Object.entries(CHARTS)) {
      expect(detectChartShape(bodiesAt([...lons].reverse()))).toBe(shape);
      const interleaved = [
        ...lons.filter((_, i) => i % 2 === 1),
        ...lons.filter((_, i) => i % 2 === 0),
      ];
      expect(detectChartShape(bodiesAt(interleaved))).toBe(shape);
    }
  });
});

describe("classifyGeometry", () => {
  const base: ChartGeometry = {
    body_count: 5,
    span: 100,
    largest_gap: 260,
    handle_count: 0,
    clump_count: 2,
    is_seesaw: false,
  };

  it("puts bucket ahead of bundle", () => {
    expect(classifyGeometry({ ...base, handle_count: 1 })).toBe("bucket");
  });

  it("needs five bodies for a bucket", () => {
    expect(classifyGeometry({ ...base, handle_count: 1, body_count: 4 })).toBe(
      "bundle"
    );
  });

  it("does not treat a three-planet handle as a bucket", () => {
    expect(
      classifyGeometry({ ...base, span: 170, largest_gap: 190, handle_count: 3 })
    ).toBe("bowl");
  });

  it("checks see-saw before locomotive", () => {
    expect(
      classifyGeometry({ ...base, span: 220, largest_gap: 140, is_seesaw: true })
    ).toBe("see_saw");
  });

  it("checks clumps before splash", () => {
    expect(
      classifyGeometry({ ...base, span: 300, largest_gap: 60, clump_count: 3 })
    ).toBe("splay");
  });
});
