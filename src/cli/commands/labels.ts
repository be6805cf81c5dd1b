/**
 * Labels command - fetch one icon per line of a labels file
 */

import ora from "ora";
import { authorize, fetchByLabels, readLabels, stats } from "../../modules";
import {
  LabelsOptionsSchema,
  createCommandContext,
  fail,
  parseOptions,
} from "../setup";

export async function labelsCommand(file: string, opts: unknown): Promise<void> {
  const options = parseOptions(LabelsOptionsSchema, opts);
  const ctx = await createCommandContext(options, "labelDelay");

  const spinner = ora({ text: "Reading labels...", indent: 2 }).start();
  let labels: string[] = [];

  try {
    labels = await readLabels(file);

    spinner.text = "Authenticating...";
    await authorize(ctx);

    spinner.succeed(`Authenticated · ${labels.length} labels to fetch`);
  } catch (error) {
    fail(spinner, "Startup failed", error);
  }

  await fetchByLabels(ctx, labels);
  stats(ctx);
}
