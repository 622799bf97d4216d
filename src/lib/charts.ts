import { writeFile } from "node:fs/promises"
import path from "node:path"
import { ensureDir } from "./files"
import type { SummaryRow } from "./evaluate"

export type BarChartSpec = {
  title: string
  yLabel: string
  labels: string[]
  values: number[]
  colors: string[]
  /** Top of the y axis. Defaults to 110% of the largest value. */
  yMax?: number
  digits: number
}

const WIDTH = 600
const HEIGHT = 400
const MARGIN = { top: 48, right: 24, bottom: 56, left: 64 }

function escapeXml(s: string): string {
  return s
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
}

/**
 * Renders a simple vertical bar chart as a standalone SVG document.
 */
export function renderBarChart(spec: BarChartSpec): string {
  const plotW = WIDTH - MARGIN.left - MARGIN.right
  const plotH = HEIGHT - MARGIN.top - MARGIN.bottom
  const finite = spec.values.map((v) => (Number.isFinite(v) ? v : 0))
  const largest = finite.reduce((m, v) => Math.max(m, v), 0)
  const yMax = spec.yMax ?? (largest > 0 ? largest * 1.1 : 1)

  const slot = finite.length > 0 ? plotW / finite.length : plotW
  const barW = slot * 0.6

  const bars = finite
    .map((v, i) => {
      const h = Math.max(0, Math.min(1, v / yMax)) * plotH
      const x = MARGIN.left + i * slot + (slot - barW) / 2
      const y = MARGIN.top + plotH - h
      const color = spec.colors[i % spec.colors.length] ?? "#4B8BF4"
      const label = escapeXml(spec.labels[i] ?? "")
      const labelY = Math.max(MARGIN.top + 12, y - 6)
      return [
        `  <rect x="${x.toFixed(1)}" y="${y.toFixed(1)}" width="${barW.toFixed(1)}" height="${h.toFixed(1)}" fill="${color}" />`,
        `  <text x="${(x + barW / 2).toFixed(1)}" y="${labelY.toFixed(1)}" text-anchor="middle" font-size="12">${v.toFixed(spec.digits)}</text>`,
        `  <text x="${(x + barW / 2).toFixed(1)}" y="${(HEIGHT - MARGIN.bottom + 20).toFixed(1)}" text-anchor="middle" font-size="12">${label}</text>`,
      ].join("\n")
    })
    .join("\n")

  const axisX = MARGIN.left
  const axisBottom = MARGIN.top + plotH

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}" font-family="sans-serif">`,
    `  <rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff" />`,
    `  <text x="${WIDTH / 2}" y="28" text-anchor="middle" font-size="16">${escapeXml(spec.title)}</text>`,
    `  <line x1="${axisX}" y1="${MARGIN.top}" x2="${axisX}" y2="${axisBottom}" stroke="#333" />`,
    `  <line x1="${axisX}" y1="${axisBottom}" x2="${WIDTH - MARGIN.right}" y2="${axisBottom}" stroke="#333" />`,
    `  <text x="${axisX - 8}" y="${MARGIN.top + 4}" text-anchor="end" font-size="11">${yMax.toFixed(spec.digits)}</text>`,
    `  <text x="${axisX - 8}" y="${axisBottom + 4}" text-anchor="end" font-size="11">0</text>`,
    `  <text transform="translate(18 ${MARGIN.top + plotH / 2}) rotate(-90)" text-anchor="middle" font-size="12">${escapeXml(spec.yLabel)}</text>`,
    bars,
    `</svg>`,
    "",
  ].join("\n")
}

async function writeChart(file: string, svg: string): Promise<string> {
  await ensureDir(path.dirname(file))
  await writeFile(file, svg, "utf8")
  return file
}

export function successRateChart(summary: SummaryRow[]): string {
  return renderBarChart({
    title: "Success Rate by Variant",
    yLabel: "Success Rate",
    labels: summary.map((s) => s.variant),
    values: summary.map((s) => s.success_rate),
    colors: ["#4B8BF4", "#34C759"],
    yMax: 1,
    digits: 2,
  })
}

export function meanTokensChart(summary: SummaryRow[]): string {
  return renderBarChart({
    title: "Mean Token Usage by Variant",
    yLabel: "Mean Token Usage (proxy)",
    labels: summary.map((s) => s.variant),
    values: summary.map((s) => s.mean_token_usage),
    colors: ["#8E8E93", "#FF9F0A"],
    digits: 1,
  })
}

export function writeSuccessRateChart(summary: SummaryRow[], file: string) {
  return writeChart(file, successRateChart(summary))
}

export function writeMeanTokensChart(summary: SummaryRow[], file: string) {
  return writeChart(file, meanTokensChart(summary))
}
