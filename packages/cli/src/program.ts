import { Command, CommanderError, InvalidArgumentError } from "commander";
import { BUILDFARM_VERSION } from "@buildfarm/core";
import { createCoordinator } from "./commands/create-coordinator";
import { uploadRelease } from "./commands/upload-release";
import { printError } from "./output";

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("buildfarm")
    .description("Provision the build farm coordinator and publish release artifacts")
    .version(BUILDFARM_VERSION)
    .exitOverride();

  program
    .command("create-coordinator")
    .description("Create the coordinator VM on Compute Engine")
    .option("--project <id>", "GCP project (default depends on --staging)")
    .option("--zone <zone>", "Compute Engine zone")
    .option("--machine-type <type>", "Machine type")
    .option("--instance-name <name>", "Name of the VM instance")
    .option("--ssh-public-key <file>", "File of SSH public keys to authorize")
    .option("--static-ip <ip>", "Static IP to use; if empty, a reserved <instance>-ip or an ephemeral one")
    .option("--reuse-disk", "Reattach the boot disk kept from a previous instance (default)")
    .option("--no-reuse-disk", "Always create a fresh boot disk, deleted with the instance")
    .option("--ssd", "Use a solid state disk (default)")
    .option("--no-ssd", "Use the default disk type")
    .option("--coordinator <url>", "Coordinator binary URL")
    .option("--staging", "Use the staging project, coordinator URL and staging- credential files")
    .option("--config <file>", "JSON config file; flags override its values")
    .option("--credentials-dir <dir>", "Directory holding client-id.dat, client-secret.dat and token.dat")
    .option("--disk-size <gb>", "Size of a fresh boot disk", parseInteger)
    .option("--poll-interval <ms>", "Operation polling interval", parseInteger)
    .option("--operation-timeout <seconds>", "Give up waiting on the create operation", parseInteger)
    .action(createCoordinator);

  program
    .command("upload-release")
    .description("Upload release artifacts and register them with the downloads page")
    .argument("<files...>", "Release files to upload")
    .requiredOption("--config <file>", "JSON file with the release upload settings")
    .action(uploadRelease);

  return program;
}

/**
 * Parse argv and run the selected command.
 *
 * @returns Process exit code
 */
export async function run(argv: readonly string[]): Promise<number> {
  const program = createProgram();

  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // commander has already printed usage or the parse error
      return error.exitCode;
    }
    printError(error);
    return 1;
  }
}
