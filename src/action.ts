/**
 * GitHub Actions entry point: compare a snapshot against a baseline and publish a report
 */

import * as core from "@actions/core";
import { compareSnapshotFiles } from "./compare.js";
import { errorMessage } from "./errors.js";
import { getActionInputs } from "./inputs.js";
import { ActionsLogger, log, setLogger } from "./logger.js";
import { generateMarkdownReport, saveReport, setReportOutputs } from "./reporter.js";
import { isFailedComparison, totalDifferences } from "./summary.js";

export async function run(): Promise<void> {
  setLogger(new ActionsLogger());

  try {
    const inputs = getActionInputs();
    log.info(`🔄 Comparing ${inputs.currentPath} against ${inputs.baselinePath}`);

    const result = compareSnapshotFiles(inputs.currentPath, inputs.baselinePath, {
      strategy: inputs.strategy,
    });

    const markdown = generateMarkdownReport(result);
    const files = saveReport(result, markdown, inputs.outputDir);
    setReportOutputs(result, files);
    if (process.env.GITHUB_STEP_SUMMARY) {
      await core.summary.addRaw(markdown).write();
    }

    if (isFailedComparison(result)) {
      core.setFailed(result.summary.error);
      return;
    }

    const differences = totalDifferences(result);
    if (differences === 0) {
      log.info("✅ No differences from baseline");
    } else if (inputs.failOnDifferences) {
      core.setFailed(`${differences} difference(s) from baseline`);
    } else {
      log.warning(`⚠️ ${differences} difference(s) from baseline`);
    }
  } catch (error) {
    core.setFailed(errorMessage(error));
  }
}
