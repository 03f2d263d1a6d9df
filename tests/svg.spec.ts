import { describe, expect, it } from "vitest";
import { generateCurve } from "../src/line/catenary.js";
import { renderCurvesSvg } from "../src/line/svg.js";

const wire = { unitWeight: 1 };
const level = generateCurve(wire, { span: 50, height1: 10 }, { dip: 0.3125, tension: 1000 }, 11);
const sagged = generateCurve(wire, { span: 50, height1: 10 }, { dip: 0.625, tension: 500 }, 11);

const count = (text: string, needle: string) => text.split(needle).length - 1;

describe("renderCurvesSvg", () => {
  it("draws one polyline and one lowest-point marker per curve", () => {
    const svg = renderCurvesSvg([
      { label: "reference 10°C", curve: level },
      { label: "maximum 40°C", curve: sagged },
    ]);
    expect(svg.startsWith("<svg ")).toBe(true);
    expect(svg.endsWith("</svg>")).toBe(true);
    expect(count(svg, "<polyline ")).toBe(2);
    expect(count(svg, "<circle ")).toBe(2);
  });

  it("plots every sample", () => {
    const svg = renderCurvesSvg([{ label: "reference", curve: level }]);
    const polyline = svg.split("\n").find((line) => line.startsWith("<polyline "));
    const points = polyline?.match(/points="([^"]*)"/)?.[1]?.split(" ") ?? [];
    expect(points).toHaveLength(11);
  });

  it("defaults the title to the span", () => {
    const svg = renderCurvesSvg([{ label: "reference", curve: level }]);
    expect(svg).toContain(">Wire catenary - S = 50.00 m</text>");
  });

  it("escapes labels and titles", () => {
    const svg = renderCurvesSvg([{ label: "A<B & \"C\"", curve: level }], { title: "x > y" });
    expect(svg).toContain(">A&lt;B &amp; &quot;C&quot;</text>");
    expect(svg).toContain(">x &gt; y</text>");
  });

  it("uses the requested canvas size", () => {
    const svg = renderCurvesSvg([{ label: "reference", curve: level }], { width: 400, height: 300 });
    expect(svg).toContain('viewBox="0 0 400 300" width="400" height="300"');
  });

  it("summarizes each curve's vertex", () => {
    const svg = renderCurvesSvg([{ label: "reference", curve: level }]);
    expect(svg).toContain("reference: apex 25.00 m, low 9.688 m");
  });

  it("needs at least one curve", () => {
    expect(() => renderCurvesSvg([])).toThrow("renderCurvesSvg needs at least one curve.");
  });
});
