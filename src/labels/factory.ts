import { existsSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import { type Config, DestinationSchema } from "@/types";
import { DestinationLabelManager } from "./label-manager";
import { SAMPLE_DESTINATIONS } from "./sample-destinations";

/**
 * Resolve the configured tag file against the project path
 */
export function getTagsFilePath(
  config: Config,
  projectPath: string = process.cwd(),
): string | undefined {
  if (!config.tagsFile) return undefined;
  return isAbsolute(config.tagsFile)
    ? config.tagsFile
    : join(projectPath, config.tagsFile);
}

/**
 * Build a label manager from config: default tags, sample destinations and
 * the startup tag file, in that order
 *
 * A configured tag file that does not exist is logged and skipped; any other
 * read or decode failure propagates so the server refuses to start on bad data.
 */
export function createLabelManager(
  config: Config,
  projectPath: string = process.cwd(),
): DestinationLabelManager {
  const manager = new DestinationLabelManager({
    seedDefaultTags: config.seedDefaultTags,
  });

  if (config.seedSampleDestinations) {
    for (const destination of SAMPLE_DESTINATIONS) {
      manager.addDestination(DestinationSchema.parse(destination));
    }
    console.error(
      `[destinations] Loaded ${SAMPLE_DESTINATIONS.length} sample destinations`,
    );
  }

  const tagsFile = getTagsFilePath(config, projectPath);
  if (tagsFile) {
    if (existsSync(tagsFile)) {
      const result = manager.importTags(tagsFile);
      console.error(
        `[destinations] Imported ${result.imported} tags from ${tagsFile} (${result.skipped} skipped)`,
      );
    } else {
      console.warn(`[destinations] Tag file not found: ${tagsFile}`);
    }
  }

  return manager;
}
