import { existsSync, readdirSync, statSync, type Dirent } from "fs";
import { join } from "path";
import { Logger } from "../utils/logger.js";

const logger = new Logger("discovery");

/**
 * One case eligible for processing.
 */
export interface CaseRef {
  /** Group directory name */
  group: string;
  /** Case directory name */
  caseName: string;
  caseDir: string;
  documentPath: string;
}

export interface DiscoveryOptions {
  corpusRoot: string;
  /** Only these group names, when non-empty */
  groupFilters?: ReadonlySet<string>;
  /** Relative path from a group directory to its case directories */
  casesSubpath: string;
  /** Document file name inside each case directory */
  documentFilename: string;
}

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function listDirectories(path: string): Dirent[] {
  try {
    return readdirSync(path, { withFileTypes: true })
      .filter(
        (entry) =>
          entry.isDirectory() ||
          (entry.isSymbolicLink() && isDirectory(join(path, entry.name)))
      )
      .sort(byName);
  } catch (error) {
    logger.debug("Directory not listable, skipping", {
      path,
      error: error instanceof Error ? error.message : String(error)
    });
    return [];
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Enumerate candidate cases in group-then-case lexicographic order.
 * Missing or malformed paths yield fewer candidates, never an error.
 */
export function discoverCases(options: DiscoveryOptions): CaseRef[] {
  const { corpusRoot, groupFilters, casesSubpath, documentFilename } =
    options;
  const cases: CaseRef[] = [];

  if (!existsSync(corpusRoot)) {
    logger.warn("Corpus root does not exist", { corpusRoot });
    return cases;
  }

  for (const groupEntry of listDirectories(corpusRoot)) {
    const group = groupEntry.name;
    if (groupFilters && groupFilters.size > 0 && !groupFilters.has(group)) {
      continue;
    }

    const casesDir = join(corpusRoot, group, casesSubpath);
    for (const caseEntry of listDirectories(casesDir)) {
      const caseDir = join(casesDir, caseEntry.name);
      const documentPath = join(caseDir, documentFilename);
      if (!isFile(documentPath)) {
        logger.debug("Case has no document, skipping", { caseDir });
        continue;
      }
      cases.push({
        group,
        caseName: caseEntry.name,
        caseDir,
        documentPath
      });
    }
  }

  logger.info("Discovery complete", {
    corpusRoot,
    candidates: cases.length
  });
  return cases;
}
