/**
 * Plain-text trend report
 *
 * The line layout is fixed; downstream tooling diffs these reports.
 */

import type { RiskLevel, TrendReport } from "../models/index.js";

export const REPORT_TITLE = "POST-MEAL BLOOD SUGAR ANALYSIS REPORT";

export const NO_DATA_REPORT = "No data available for analysis.";

/**
 * Closing paragraph per risk level
 */
export const RISK_SUMMARIES: Record<RiskLevel, string> = {
  high:
    "Your blood sugar patterns indicate a high risk of spikes. " +
    "Consider consulting with a healthcare provider immediately. " +
    "Focus on reducing refined carbohydrates and increasing fiber intake. " +
    "Monitor blood sugar more frequently.",
  moderate:
    "Your blood sugar patterns show moderate risk. " +
    "Consider dietary modifications such as smaller portion sizes " +
    "and choosing complex carbohydrates over simple sugars. " +
    "Regular monitoring is recommended.",
  low:
    "Your blood sugar patterns appear well-managed. " +
    "Continue maintaining healthy eating habits and regular monitoring. " +
    "Consider tracking your diet to identify patterns that support stable blood sugar.",
  unknown:
    "Insufficient data to assess risk level. " +
    "Ensure consistent data collection for accurate analysis.",
};

function mgDl(value: number | null): string {
  return value === null ? "n/a mg/dL" : `${value.toFixed(1)} mg/dL`;
}

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Render a trend report as text
 */
export function formatTrendReport(report: TrendReport): string {
  if (report.isEmpty || !report.summary) {
    return NO_DATA_REPORT;
  }

  const { summary, riskCounts, riskLevel } = report;

  const lines = [
    REPORT_TITLE,
    "=".repeat(40),
    "",
    "Overall Statistics:",
    `  Average Blood Sugar: ${mgDl(summary.mean)}`,
    `  Maximum Blood Sugar: ${mgDl(summary.max)}`,
    `  Minimum Blood Sugar: ${mgDl(summary.min)}`,
    `  Standard Deviation: ${mgDl(summary.stdDev)}`,
    "",
    "Risk Assessment:",
    `  Risk Level: ${titleCase(riskLevel)}`,
    `  High Spikes: ${riskCounts.high}`,
    `  Normal Range: ${riskCounts.normal}`,
    `  Low Spikes: ${riskCounts.low}`,
    "",
  ];

  if (report.mealBreakdown) {
    lines.push("Meal Type Analysis:");
    for (const stats of report.mealBreakdown) {
      lines.push(`  ${stats.mealType}:`);
      lines.push(`    Mean: ${mgDl(stats.mean)}`);
      lines.push(`    Max: ${mgDl(stats.max)}`);
      lines.push(`    Min: ${mgDl(stats.min)}`);
      lines.push(`    Std Dev: ${mgDl(stats.stdDev)}`);
    }
    lines.push("");
  }

  lines.push("Recommendations:", RISK_SUMMARIES[riskLevel]);

  return lines.join("\n");
}
