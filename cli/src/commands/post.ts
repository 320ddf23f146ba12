import { Command } from "commander";
import { readFileSync, statSync } from "node:fs";
import { basename, extname } from "node:path";
import {
  mimeTypeFor,
  PostOrchestratorError,
  type MediaAttachment,
  type PostingProgress,
} from "@fanpost/core";
import { withApp } from "../utils/app.js";
import { requireConfig } from "../utils/config.js";
import { createSpinner, error, resultRows, success, table, warn } from "../utils/display.js";
import { selectTargets } from "../utils/selection.js";

interface PostOptions {
  platform?: string[];
  account?: string[];
  image?: string[];
  dryRun: boolean;
}

export const IMAGE_EXTENSIONS: readonly string[] = ["jpg", "jpeg", "png", "gif", "webp"];
export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;

/** Read `--image` files, refusing other file types and anything over 10MB. */
export function readAttachments(paths: readonly string[]): MediaAttachment[] {
  return paths.map((path) => {
    const fileName = basename(path);
    if (!IMAGE_EXTENSIONS.includes(extname(fileName).slice(1).toLowerCase())) {
      throw new Error(`Unsupported image type: ${fileName} (use ${IMAGE_EXTENSIONS.join(", ")})`);
    }
    if (statSync(path).size > MAX_IMAGE_BYTES) {
      throw new Error(`${fileName} exceeds the 10MB image limit`);
    }
    return { fileName, bytes: new Uint8Array(readFileSync(path)), mimeType: mimeTypeFor(fileName) };
  });
}

function progressText(progress: PostingProgress): string {
  const pct = progress.overallProgress === undefined ? "" : ` ${Math.round(progress.overallProgress * 100)}%`;
  return `${progress.overallMessage ?? progress.state}${pct}`;
}

export const postCommand = new Command("post")
  .description("Publish a post to the selected accounts")
  .argument("<content>", "Text of the post")
  .option("--platform <ids...>", "Only these platforms")
  .option("--account <ids...>", "Only these accounts (id or unique prefix)")
  .option("--image <files...>", "Attach images (uploaded to the account's Blossom server)")
  .option("--dry-run", "Run the whole flow against in-process mock services", false)
  .action(async (content: string, opts: PostOptions) => {
    const loaded = requireConfig();
    const config = { ...loaded, posting: { dryRun: opts.dryRun || loaded.posting.dryRun } };

    if (config.posting.dryRun) {
      warn("Dry run: nothing will be published.");
    }

    try {
      const media = readAttachments(opts.image ?? []);

      await withApp(config, async (app) => {
        const { platforms, accountsByPlatform } = selectTargets(app.accounts.all, opts.platform, opts.account);

        const spinner = createSpinner("Preparing...");
        const onProgress = (progress: PostingProgress) => {
          spinner.text = progressText(progress);
        };
        app.orchestrator.on("progress", onProgress);

        const cancel = () => {
          if (app.orchestrator.cancel()) spinner.warn("Cancelling...");
        };
        process.once("SIGINT", cancel);

        spinner.start();
        try {
          const result = await app.orchestrator.publishToSelectedPlatforms(
            { content, media },
            platforms,
            accountsByPlatform,
          );

          if (result.allSuccessful) spinner.succeed(result.getSummaryMessage());
          else if (result.allFailed) spinner.fail(result.getSummaryMessage());
          else spinner.warn(result.getSummaryMessage());

          table(["Target", "Status", "Detail"], resultRows(result));
          if (result.allFailed) process.exitCode = 1;
          else if (result.allSuccessful) success("Done.");
        } catch (err) {
          spinner.fail("Post not sent");
          throw err;
        } finally {
          process.off("SIGINT", cancel);
          app.orchestrator.off("progress", onProgress);
        }
      });
    } catch (err) {
      error(err instanceof PostOrchestratorError ? `${err.message} (${err.code})` : err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    }
  });
