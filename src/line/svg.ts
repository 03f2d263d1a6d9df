/**
 * SVG plot of one or more catenary curves on a shared frame.
 */
import type { CatenaryCurve } from "./catenary.js";

export interface CurveSeries {
  label: string;
  curve: CatenaryCurve;
}

export interface SvgOptions {
  title?: string;
  width?: number;
  height?: number;
}

const SERIES_COLORS = ["#1565c0", "#d32f2f", "#f57c00", "#2e7d32", "#7b1fa2", "#00838f"];

export function renderCurvesSvg(series: CurveSeries[], options: SvgOptions = {}): string {
  if (series.length === 0) {
    throw new Error("renderCurvesSvg needs at least one curve.");
  }

  const width = options.width ?? 800;
  const height = options.height ?? 480;
  const margin = { top: 50, right: 40, bottom: 70, left: 70 };
  const plotWidth = width - margin.left - margin.right;
  const plotHeight = height - margin.top - margin.bottom;

  // Extents over every sample
  let xMax = 0;
  let yMin = Infinity;
  let yMax = -Infinity;
  for (const s of series) {
    for (const p of s.curve.points) {
      if (p.x > xMax) xMax = p.x;
      if (p.y < yMin) yMin = p.y;
      if (p.y > yMax) yMax = p.y;
    }
  }
  const pad = (yMax - yMin) * 0.1 || 0.5;
  yMin -= pad;
  yMax += pad;
  const xRange = xMax || 1;

  const xScale = (x: number) => margin.left + (x / xRange) * plotWidth;
  const yScale = (y: number) => margin.top + ((yMax - y) / (yMax - yMin)) * plotHeight;

  const lines: string[] = [];
  lines.push(`<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${width} ${height}" width="${width}" height="${height}" font-family="Arial, sans-serif" font-size="11">`);
  lines.push(`<rect width="${width}" height="${height}" fill="#fafafa" rx="4"/>`);

  const title = options.title ?? `Wire catenary - S = ${xMax.toFixed(2)} m`;
  lines.push(`<text x="${width / 2}" y="24" text-anchor="middle" font-size="14" font-weight="bold">${escapeXml(title)}</text>`);

  drawAxes(lines, margin.left, margin.top, plotWidth, plotHeight, xRange, yMin, yMax);

  // Supports, taken from the first series
  const first = series[0]?.curve.points ?? [];
  const left = first[0];
  const right = first[first.length - 1];
  for (const support of [left, right]) {
    if (!support) continue;
    const sx = xScale(support.x);
    lines.push(`<line x1="${sx}" y1="${yScale(support.y)}" x2="${sx}" y2="${margin.top + plotHeight}" stroke="#333" stroke-width="3"/>`);
  }

  series.forEach((s, idx) => {
    const color = SERIES_COLORS[idx % SERIES_COLORS.length] ?? "#333";
    const pts = s.curve.points.map((p) => `${round2(xScale(p.x))},${round2(yScale(p.y))}`).join(" ");
    lines.push(`<polyline points="${pts}" fill="none" stroke="${color}" stroke-width="1.8"/>`);

    const low = s.curve.lowestPoint;
    lines.push(`<circle cx="${round2(xScale(low.x))}" cy="${round2(yScale(low.y))}" r="3" fill="${color}"/>`);

    // Legend row
    const ly = height - margin.bottom + 36;
    const lx = margin.left + idx * 170;
    lines.push(`<line x1="${lx}" y1="${ly}" x2="${lx + 20}" y2="${ly}" stroke="${color}" stroke-width="2"/>`);
    lines.push(`<text x="${lx + 26}" y="${ly + 4}" font-size="10">${escapeXml(s.label)}</text>`);
  });

  const summary = series
    .map((s) => `${s.label}: apex ${s.curve.apexOffset.toFixed(2)} m, low ${s.curve.lowestPoint.y.toFixed(3)} m`)
    .join(" | ");
  lines.push(`<text x="${width / 2}" y="${height - 10}" text-anchor="middle" font-size="10" fill="#555">${escapeXml(summary)}</text>`);

  lines.push(`</svg>`);
  return lines.join("\n");
}

function drawAxes(
  lines: string[],
  left: number,
  top: number,
  plotWidth: number,
  plotHeight: number,
  xRange: number,
  yMin: number,
  yMax: number,
): void {
  const bottom = top + plotHeight;

  lines.push(`<rect x="${left}" y="${top}" width="${plotWidth}" height="${plotHeight}" fill="white" stroke="#ddd" stroke-width="0.5"/>`);

  for (let i = 0; i <= 4; i++) {
    const frac = i / 4;
    const gy = top + frac * plotHeight;
    const gx = left + frac * plotWidth;
    const yVal = (yMax - frac * (yMax - yMin)).toFixed(2);
    const xVal = (frac * xRange).toFixed(1);
    lines.push(`<line x1="${left}" y1="${gy}" x2="${left + plotWidth}" y2="${gy}" stroke="#eee" stroke-width="0.5"/>`);
    lines.push(`<text x="${left - 4}" y="${gy + 3}" text-anchor="end" font-size="9" fill="#888">${yVal}</text>`);
    lines.push(`<text x="${gx}" y="${bottom + 14}" text-anchor="middle" font-size="9" fill="#888">${xVal}</text>`);
  }

  lines.push(`<text x="${left + plotWidth / 2}" y="${bottom + 28}" text-anchor="middle" font-size="10">Horizontal distance (m)</text>`);
  lines.push(`<text x="${left - 48}" y="${top + plotHeight / 2}" text-anchor="middle" font-size="10" transform="rotate(-90 ${left - 48} ${top + plotHeight / 2})">Height (m)</text>`);
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
