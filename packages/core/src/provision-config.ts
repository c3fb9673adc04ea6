import { z } from "zod";
import {
  DEFAULT_CREDENTIALS_DIR,
  DEFAULT_DISK_SIZE_GB,
  DEFAULT_INSTANCE_NAME,
  DEFAULT_MACHINE_TYPE,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_REUSE_DISK,
  DEFAULT_SERVICE_ACCOUNT_SCOPES,
  DEFAULT_USE_SSD,
  DEFAULT_ZONE,
  ENVIRONMENT_PROFILES,
} from "./constants";
import { parseConfig } from "./config-validation";

// =============================================================================
// Field schemas
// =============================================================================

export const EnvironmentNameSchema = z.enum(["production", "staging"]);

/** Compute Engine resource names: RFC 1035 labels, lowercase. */
export const ResourceNameSchema = z
  .string()
  .regex(/^[a-z]([-a-z0-9]{0,61}[a-z0-9])?$/, "must be a lowercase RFC 1035 name (max 63 chars)");

/**
 * One OpenSSH public key line: "<type> <base64> [comment]".
 */
export const SshPublicKeySchema = z
  .string()
  .trim()
  .regex(
    /^(ssh-(rsa|dss|ed25519)|ecdsa-sha2-nistp(256|384|521)|sk-(ssh-ed25519|ecdsa-sha2-nistp256)@openssh\.com) [A-Za-z0-9+/]+={0,3}( [^\r\n]*)?$/,
    "must be a single OpenSSH public key line"
  );

// =============================================================================
// Provision config
// =============================================================================

export const ProvisionConfigSchema = z.object({
  environment: EnvironmentNameSchema.default("production"),
  projectId: z.string().min(1, "project is required"),
  zone: z.string().min(1).default(DEFAULT_ZONE),
  machineType: z.string().min(1).default(DEFAULT_MACHINE_TYPE),
  instanceName: ResourceNameSchema.default(DEFAULT_INSTANCE_NAME),
  /** Keys appended to the cloud-config as ssh_authorized_keys */
  sshPublicKeys: z.array(SshPublicKeySchema).default([]),
  /** External IP to bind; when absent a reserved "<instance>-ip" address is looked up */
  staticIp: z.string().ip().optional(),
  reuseDisk: z.boolean().default(DEFAULT_REUSE_DISK),
  ssd: z.boolean().default(DEFAULT_USE_SSD),
  coordinatorUrl: z.string().url(),
  diskSizeGb: z.number().int().positive().default(DEFAULT_DISK_SIZE_GB),
  pollIntervalMs: z.number().int().nonnegative().default(DEFAULT_POLL_INTERVAL_MS),
  /** Upper bound on operation polling. Unset means poll until a terminal state. */
  operationTimeoutMs: z.number().int().positive().optional(),
  serviceAccountScopes: z.array(z.string().url()).min(1).default([...DEFAULT_SERVICE_ACCOUNT_SCOPES]),
  credentialsDir: z.string().min(1).default(DEFAULT_CREDENTIALS_DIR),
});

type ParsedProvisionConfig = z.infer<typeof ProvisionConfigSchema>;

export type ProvisionConfig = Readonly<
  Omit<ParsedProvisionConfig, "sshPublicKeys" | "serviceAccountScopes">
> & {
  readonly sshPublicKeys: readonly string[];
  readonly serviceAccountScopes: readonly string[];
};

/**
 * Operator input before environment defaults are applied. Project and
 * coordinator URL fall back to the selected environment's profile.
 */
export type ProvisionConfigInput = Omit<
  z.input<typeof ProvisionConfigSchema>,
  "projectId" | "coordinatorUrl"
> & {
  projectId?: string;
  coordinatorUrl?: string;
};

/** Shape accepted from a JSON config file; CLI flags are layered on top. */
export const ProvisionConfigFileSchema = ProvisionConfigSchema.partial()
  .extend({
    // "" means automatic, as it does for --static-ip
    staticIp: z
      .union([z.literal("").transform(() => undefined), z.string().ip()])
      .optional(),
  })
  .strict();
export type ProvisionConfigFile = z.infer<typeof ProvisionConfigFileSchema>;

/**
 * Build the immutable configuration for one provisioning run.
 */
export function resolveProvisionConfig(input: ProvisionConfigInput): ProvisionConfig {
  const environment = input.environment ?? "production";
  const profile = ENVIRONMENT_PROFILES[environment];

  const parsed = parseConfig(
    ProvisionConfigSchema,
    {
      ...input,
      environment,
      projectId: input.projectId ?? profile.projectId,
      coordinatorUrl: input.coordinatorUrl ?? profile.coordinatorUrl,
      staticIp: input.staticIp === "" ? undefined : input.staticIp,
    },
    "provision config"
  );

  return Object.freeze({
    ...parsed,
    sshPublicKeys: Object.freeze([...parsed.sshPublicKeys]),
    serviceAccountScopes: Object.freeze([...parsed.serviceAccountScopes]),
  });
}

export function credentialFilePrefix(config: Pick<ProvisionConfig, "environment">): string {
  return ENVIRONMENT_PROFILES[config.environment].credentialFilePrefix;
}
