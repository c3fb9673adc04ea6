import chalk from "chalk";
import ora from "ora";
import path from "path";
import { resolveReleaseUploadConfig } from "@buildfarm/core";
import {
  GcsReleaseStorage,
  HttpReleaseRegistry,
  ReleaseUploader,
} from "@buildfarm/cloud-providers";
import { readJsonFile } from "../config-file";

export interface UploadReleaseOptions {
  /** JSON file with the release upload settings */
  config: string;
}

export async function uploadRelease(files: string[], options: UploadReleaseOptions): Promise<void> {
  const config = resolveReleaseUploadConfig(await readJsonFile(options.config));

  const uploader = new ReleaseUploader({
    product: config.product,
    storage: GcsReleaseStorage.fromConfig({
      projectId: config.projectId,
      bucket: config.bucket,
      keyFilename: config.serviceAccountKeyFile,
    }),
    registry: new HttpReleaseRegistry({
      url: config.registrationUrl,
      user: config.user,
      key: config.registrationKey,
    }),
  });

  uploader.parseAll(files);
  console.log(chalk.blue.bold(`Uploading ${files.length} file(s) to gs://${config.bucket}\n`));

  for (const file of files) {
    const spinner = ora(`Uploading ${path.basename(file)}`).start();
    try {
      const record = await uploader.upload(file);
      spinner.succeed(`${record.Filename} ${chalk.gray(`${record.Kind}, ${record.Size} bytes, sha1 ${record.Checksum}`)}`);
    } catch (error) {
      spinner.fail(`Failed to upload ${path.basename(file)}`);
      throw error;
    }
  }
}
