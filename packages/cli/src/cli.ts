#!/usr/bin/env tsx
/**
 * Glycotrend CLI
 */

import { config as loadEnv } from "dotenv";
import { program } from "commander";
import { EXPORT_FORMATS } from "@glycotrend/diabetes";
import { CONFIG_FILE, resolveSettings, updateConfig } from "./config.js";
import type { SettingsOverrides } from "./config.js";
import { runExport, runRecommend, runReport, runSummary } from "./commands.js";

// Load .env from the working directory
loadEnv();

interface GlobalOptions {
  timezone?: string;
}

function settingsFor(overrides: SettingsOverrides = {}) {
  const { timezone } = program.opts<GlobalOptions>();
  return resolveSettings({ timezone, ...overrides });
}

/**
 * Run a command action, printing failures and exiting non-zero
 */
async function run(action: () => void | Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${errorMsg}`);
    process.exit(1);
  }
}

function parseRisk(value: string): number {
  return Number(value);
}

program
  .name("glycotrend")
  .description("Post-meal glucose trend analysis and dietary recommendations")
  .version("0.1.0")
  .option("--timezone <tz>", "Timezone for timestamps without an offset");

program
  .command("report")
  .description("Print the trend report for a readings CSV")
  .argument("<readings>", "Readings CSV (timestamp, glucose, optional meal_type)")
  .action((readings: string) =>
    run(() => {
      console.log(runReport(readings, settingsFor()));
    })
  );

program
  .command("recommend")
  .description("Print dietary recommendations as JSON")
  .argument("<readings>", "Readings CSV")
  .option("--activity <level>", "Activity level (sedentary, light, moderate, active)")
  .option("--genetic-risk <n>", "Genetic risk factor between 0 and 1", parseRisk)
  .option("--genetic-file <path>", "Genetic data JSON file")
  .option("--meals <path>", "Meals CSV used for average carbohydrate intake")
  .action(
    (
      readings: string,
      options: { activity?: string; geneticRisk?: number; geneticFile?: string; meals?: string }
    ) =>
      run(() => {
        const settings = settingsFor({
          activityLevel: options.activity,
          geneticDataPath: options.geneticFile,
        });
        const result = runRecommend(readings, { geneticRisk: options.geneticRisk, mealsPath: options.meals }, settings);
        console.log(JSON.stringify(result, null, 2));
      })
  );

program
  .command("summary")
  .description("Print the tracker summary as JSON")
  .argument("<readings>", "Readings CSV")
  .argument("<meals>", "Meals CSV (timestamp, name, carbs)")
  .action((readings: string, meals: string) =>
    run(() => {
      console.log(JSON.stringify(runSummary(readings, meals, settingsFor()), null, 2));
    })
  );

program
  .command("export")
  .description("Write the trend report to a file")
  .argument("<readings>", "Readings CSV")
  .requiredOption("--out <file>", "Output file")
  .option("--format <format>", `Output format (${EXPORT_FORMATS.join(", ")})`, "csv")
  .action((readings: string, options: { out: string; format: string }) =>
    run(async () => {
      const ok = await runExport(readings, options.out, options.format, settingsFor());
      if (!ok) {
        process.exit(1);
      }
      console.log(`Wrote ${options.out}`);
    })
  );

program
  .command("config")
  .description("Show effective settings, or save defaults")
  .option("--activity <level>", "Default activity level")
  .option("--genetic-file <path>", "Default genetic data JSON file")
  .action((options: { activity?: string; geneticFile?: string }) =>
    run(() => {
      const { timezone } = program.opts<GlobalOptions>();
      if (timezone || options.activity || options.geneticFile) {
        updateConfig({ timezone, activityLevel: options.activity, geneticDataPath: options.geneticFile });
        console.log(`Saved settings to ${CONFIG_FILE}\n`);
      }
      console.log(JSON.stringify(resolveSettings(), null, 2));
    })
  );

await program.parseAsync();
