/**
 * Report rendering
 */

export { REPORT_TITLE, NO_DATA_REPORT, RISK_SUMMARIES, formatTrendReport } from "./text-report.js";
