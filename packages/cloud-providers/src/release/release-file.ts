/**
 * Release artifact naming.
 *
 * Recognized names, for a product "acme":
 *   acme1.5beta2.src.tar.gz
 *   acme1.5.1.linux-386.tar.gz
 *   acme1.5.windows-amd64.msi
 *   acme1.5.darwin-amd64-osx10.8.pkg
 */

import { ReleaseUploadError } from "../errors";

export type ReleaseKind = "source" | "archive" | "installer";

export interface ReleaseFile {
  fileName: string;
  version: string;
  /** Empty for source releases */
  os: string;
  /** Empty for source releases */
  arch: string;
  variant?: string;
  kind: ReleaseKind;
}

const EXTENSIONS = String.raw`tar\.gz|zip|pkg|msi`;

export function releaseFilePattern(product: string): RegExp {
  return new RegExp(
    String.raw`^(${product}[a-z0-9-.]+)\.(src|([a-z0-9]+)-([a-z0-9]+)(?:-([a-z0-9.]+))?)\.(${EXTENSIONS})$`
  );
}

export function classifyRelease(fileName: string, source: boolean): ReleaseKind {
  if (source) return "source";
  if (fileName.endsWith(".msi") || fileName.endsWith(".pkg")) return "installer";
  return "archive";
}

/**
 * Parse a release artifact's base name.
 *
 * @throws ReleaseUploadError for a name the release tooling would not produce
 */
export function parseReleaseFilename(fileName: string, product: string): ReleaseFile {
  const match = releaseFilePattern(product).exec(fileName);
  if (!match) {
    throw new ReleaseUploadError(`unrecognized file: ${JSON.stringify(fileName)}`, {
      suggestions: [`Expected ${product}<version>.<src|os-arch[-variant]>.<tar.gz|zip|pkg|msi>`],
    });
  }

  const [, version = "", target, os = "", arch = "", variant] = match;
  const source = target === "src";
  return {
    fileName,
    version,
    os,
    arch,
    ...(variant ? { variant } : {}),
    kind: classifyRelease(fileName, source),
  };
}
