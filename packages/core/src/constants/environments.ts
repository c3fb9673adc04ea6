/**
 * Environment profiles.
 *
 * The staging switch moves three things at once: the default project, the
 * default coordinator binary URL, and the namespace of the local OAuth files.
 */

export type EnvironmentName = "production" | "staging";

export interface EnvironmentProfile {
  /** Project used when none is given explicitly */
  projectId: string;
  /** Coordinator binary fetched by the VM at boot */
  coordinatorUrl: string;
  /** Prepended to client-id.dat, client-secret.dat and token.dat */
  credentialFilePrefix: string;
}

export const ENVIRONMENT_PROFILES: Readonly<Record<EnvironmentName, EnvironmentProfile>> = {
  production: {
    projectId: "buildfarm-prod",
    coordinatorUrl: "https://storage.googleapis.com/buildfarm-builder-data/coordinator",
    credentialFilePrefix: "",
  },
  staging: {
    projectId: "buildfarm-dev",
    coordinatorUrl: "https://storage.googleapis.com/dev-buildfarm-builder-data/coordinator",
    credentialFilePrefix: "staging-",
  },
};
