/**
 * Release Registry
 *
 * Records an uploaded artifact with the downloads page backend.
 */

import { ReleaseUploadError, describeCause } from "../errors";

/** Wire format expected by the downloads page. */
export interface ReleaseRecord {
  Filename: string;
  Version: string;
  OS: string;
  Arch: string;
  /** SHA-1 of the file contents, lowercase hex */
  Checksum: string;
  Size: number;
  Kind: string;
}

export interface ReleaseRegistry {
  register(record: ReleaseRecord): Promise<void>;
}

export interface HttpReleaseRegistryOptions {
  url: string;
  user: string;
  key: string;
  fetch?: typeof fetch;
}

export class HttpReleaseRegistry implements ReleaseRegistry {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpReleaseRegistryOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async register(record: ReleaseRecord): Promise<void> {
    const url = new URL(this.options.url);
    url.searchParams.set("user", this.options.user);
    url.searchParams.set("key", this.options.key);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(record),
      });
    } catch (error) {
      throw new ReleaseUploadError(`registering ${record.Filename}: ${describeCause(error)}`, {
        cause: error,
      });
    }

    if (response.status !== 200) {
      const body = await response.text();
      throw new ReleaseUploadError(
        `upload failed: ${response.status} ${response.statusText}\n${body}`
      );
    }
  }
}
