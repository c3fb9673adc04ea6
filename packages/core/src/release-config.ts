import { z } from "zod";
import { parseConfig } from "./config-validation";

export const ReleaseUploadConfigSchema = z.object({
  /** Leading name shared by every artifact, e.g. "acme" in acme1.4.linux-amd64.tar.gz */
  product: z.string().regex(/^[a-z][a-z0-9]*$/, "must be lowercase alphanumeric"),
  bucket: z.string().min(1),
  projectId: z.string().min(1),
  /** Endpoint that records uploaded artifacts for the downloads page */
  registrationUrl: z.string().url(),
  user: z.string().min(1),
  registrationKey: z.string().min(1),
  /** Service-account JSON used for the storage upload */
  serviceAccountKeyFile: z.string().min(1),
});

export type ReleaseUploadConfig = Readonly<z.infer<typeof ReleaseUploadConfigSchema>>;

export function resolveReleaseUploadConfig(input: unknown): ReleaseUploadConfig {
  return Object.freeze(parseConfig(ReleaseUploadConfigSchema, input, "release upload config"));
}
