export * from "./constants";
export * from "./config-validation";
export * from "./provision-config";
export * from "./release-config";

export const BUILDFARM_VERSION = "0.1.0";
