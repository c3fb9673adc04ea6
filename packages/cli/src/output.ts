import chalk from "chalk";
import { ConfigValidationError } from "@buildfarm/core";
import { ProvisionError, describeCause } from "@buildfarm/cloud-providers";
import type { LogCallback } from "@buildfarm/cloud-providers";

/**
 * Log callback that prints workflow output to the terminal.
 */
export function createLogPrinter(): LogCallback {
  return (message, stream) => {
    if (stream === "stderr") {
      console.error(chalk.red(message));
    } else {
      console.log(message);
    }
  };
}

export function printError(error: unknown): void {
  const message = describeCause(error);
  console.error(chalk.red("Error:"), message);

  if (error instanceof ConfigValidationError && error.issues.length > 1) {
    for (const issue of error.issues) {
      console.error(chalk.gray(`  - ${issue}`));
    }
  }

  if (error instanceof ProvisionError && error.suggestions.length > 0) {
    console.error(chalk.yellow("\nSuggestions:"));
    for (const suggestion of error.suggestions) {
      console.error(chalk.gray(`  • ${suggestion}`));
    }
  }
}
