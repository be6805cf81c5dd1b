/**
 * Config command - Show configuration file location
 */

import { getUserConfigPath } from "../../utils";

export function configCommand(): void {
  const configPath = getUserConfigPath();
  console.log("User configuration file location:");
  console.log(configPath);
  console.log("\nCreate this file to override defaults (API timeout, delays,");
  console.log("normalizer rules, ...). Pass --config <path> for a one-off file.");
  console.log("See src/config/default.json for available options.");
}
