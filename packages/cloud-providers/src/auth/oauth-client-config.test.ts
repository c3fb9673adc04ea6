import { mkdtemp, rm, writeFile } from "fs/promises";
import * as os from "os";
import * as path from "path";
import { credentialFilePaths, loadOAuthClientConfig } from "./oauth-client-config";
import { GoogleOAuthSession } from "./oauth-session";
import { CredentialError } from "../errors";

describe("credentialFilePaths", () => {
  it("prefixes every file name", () => {
    expect(credentialFilePaths("/creds", "staging-")).toEqual({
      clientId: "/creds/staging-client-id.dat",
      clientSecret: "/creds/staging-client-secret.dat",
      token: "/creds/staging-token.dat",
    });
  });
});

describe("loadOAuthClientConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "oauth-client-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads and trims the client files", async () => {
    await writeFile(path.join(dir, "client-id.dat"), "test-client-id\n");
    await writeFile(path.join(dir, "client-secret.dat"), "  test-secret  \n");

    await expect(loadOAuthClientConfig(dir, "")).resolves.toEqual({
      clientId: "test-client-id",
      clientSecret: "test-secret",
      redirectUri: "urn:ietf:wg:oauth:2.0:oob",
    });
  });

  it("uses the environment prefix", async () => {
    await writeFile(path.join(dir, "client-id.dat"), "prod-id");
    await writeFile(path.join(dir, "client-secret.dat"), "prod-secret");
    await writeFile(path.join(dir, "staging-client-id.dat"), "staging-id");
    await writeFile(path.join(dir, "staging-client-secret.dat"), "staging-secret");

    await expect(loadOAuthClientConfig(dir, "staging-")).resolves.toMatchObject({
      clientId: "staging-id",
      clientSecret: "staging-secret",
    });
  });

  it("throws CredentialError when a file is missing", async () => {
    await writeFile(path.join(dir, "client-id.dat"), "test-client-id");

    const promise = loadOAuthClientConfig(dir, "");

    await expect(promise).rejects.toBeInstanceOf(CredentialError);
    await expect(promise).rejects.toThrow(
      `Error reading client secret from ${path.join(dir, "client-secret.dat")}`
    );
  });

  it("throws CredentialError when a file is blank", async () => {
    await writeFile(path.join(dir, "client-id.dat"), "\n");

    await expect(loadOAuthClientConfig(dir, "")).rejects.toThrow(
      `${path.join(dir, "client-id.dat")} is empty; expected the OAuth client ID`
    );
  });
});

describe("GoogleOAuthSession", () => {
  it("builds an offline authorization URL for the out-of-band redirect", () => {
    const session = new GoogleOAuthSession({
      clientId: "test-client-id",
      clientSecret: "test-secret",
      redirectUri: "urn:ietf:wg:oauth:2.0:oob",
    });

    const url = new URL(
      session.authorizationUrl([
        "https://www.googleapis.com/auth/compute",
        "https://www.googleapis.com/auth/cloud-platform",
      ])
    );

    expect(url.searchParams.get("client_id")).toBe("test-client-id");
    expect(url.searchParams.get("redirect_uri")).toBe("urn:ietf:wg:oauth:2.0:oob");
    expect(url.searchParams.get("access_type")).toBe("offline");
    expect(url.searchParams.get("scope")).toBe(
      "https://www.googleapis.com/auth/compute https://www.googleapis.com/auth/cloud-platform"
    );
  });
});
