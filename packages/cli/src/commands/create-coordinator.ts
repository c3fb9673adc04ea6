import chalk from "chalk";
import {
  ProvisionConfigFileSchema,
  credentialFilePrefix,
  parseConfig,
  resolveProvisionConfig,
} from "@buildfarm/core";
import type {
  ProvisionConfig,
  ProvisionConfigFile,
  ProvisionConfigInput,
} from "@buildfarm/core";
import {
  GceCoordinatorTarget,
  GceManagerFactory,
  createDefaultCredentialProvider,
} from "@buildfarm/cloud-providers";
import { readJsonFile, readSshPublicKeys } from "../config-file";
import { createLogPrinter } from "../output";
import { promptForAuthCode } from "../prompts";

export interface CreateCoordinatorOptions {
  project?: string;
  zone?: string;
  machineType?: string;
  instanceName?: string;
  /** File of OpenSSH public keys to authorize */
  sshPublicKey?: string;
  staticIp?: string;
  reuseDisk?: boolean;
  ssd?: boolean;
  coordinator?: string;
  staging?: boolean;
  config?: string;
  credentialsDir?: string;
  diskSize?: number;
  pollInterval?: number;
  /** Seconds */
  operationTimeout?: number;
}

/**
 * Layer CLI flags over the optional config file.
 */
export async function buildProvisionInput(
  options: CreateCoordinatorOptions
): Promise<ProvisionConfigInput> {
  const file: ProvisionConfigFile = options.config
    ? parseConfig(
        ProvisionConfigFileSchema,
        await readJsonFile(options.config),
        `config file ${options.config}`
      )
    : {};
  const sshPublicKeys = options.sshPublicKey
    ? await readSshPublicKeys(options.sshPublicKey)
    : file.sshPublicKeys;

  return {
    environment: options.staging ? "staging" : file.environment,
    projectId: options.project ?? file.projectId,
    zone: options.zone ?? file.zone,
    machineType: options.machineType ?? file.machineType,
    instanceName: options.instanceName ?? file.instanceName,
    sshPublicKeys,
    staticIp: options.staticIp ?? file.staticIp,
    reuseDisk: options.reuseDisk ?? file.reuseDisk,
    ssd: options.ssd ?? file.ssd,
    coordinatorUrl: options.coordinator ?? file.coordinatorUrl,
    diskSizeGb: options.diskSize ?? file.diskSizeGb,
    pollIntervalMs: options.pollInterval ?? file.pollIntervalMs,
    operationTimeoutMs:
      options.operationTimeout !== undefined
        ? options.operationTimeout * 1000
        : file.operationTimeoutMs,
    serviceAccountScopes: file.serviceAccountScopes,
    credentialsDir: options.credentialsDir ?? file.credentialsDir,
  };
}

function printSummary(config: ProvisionConfig): void {
  console.log(chalk.blue.bold("Build farm coordinator\n"));
  console.log(chalk.gray("Project:     ") + config.projectId);
  console.log(chalk.gray("Zone:        ") + config.zone);
  console.log(chalk.gray("Instance:    ") + config.instanceName);
  console.log(chalk.gray("Machine:     ") + config.machineType);
  console.log(chalk.gray("Coordinator: ") + config.coordinatorUrl);
  if (config.environment === "staging") {
    console.log(chalk.yellow("Environment: staging"));
  }
  console.log();
}

export async function createCoordinator(options: CreateCoordinatorOptions): Promise<void> {
  const config = resolveProvisionConfig(await buildProvisionInput(options));
  const log = createLogPrinter();

  printSummary(config);

  const credential = await createDefaultCredentialProvider({
    credentialsDir: config.credentialsDir,
    filePrefix: credentialFilePrefix(config),
    prompt: promptForAuthCode,
    log,
  }).acquire();

  const managers = GceManagerFactory.createManagers({
    projectId: config.projectId,
    zone: config.zone,
    auth: credential.auth,
    log,
  });
  const target = new GceCoordinatorTarget({ config, managers });
  target.setLogCallback(log);

  const { instance } = await target.provision();

  console.log();
  console.log(chalk.green(`✓ Coordinator ${instance.name ?? config.instanceName} created`));
}
