import { existsSync } from "fs";
import { resolve } from "path";
import { SENTINEL_MARKER } from "../utils/constants.js";
import { findImageReferences } from "./markdown.js";

/**
 * Reason codes for documents that do not need a generated diagram.
 */
export const SkipReasons = {
  ALREADY_INJECTED: "already-injected",
  HAS_LOCAL_IMAGE: "has-local-image",
  UNREADABLE: "unreadable"
} as const;

export type SkipReason = (typeof SkipReasons)[keyof typeof SkipReasons];

/**
 * Result of readiness classification.
 */
export type Readiness =
  | { needsDiagram: true; outcome: "needs-diagram" }
  | { needsDiagram: false; outcome: typeof SkipReasons.ALREADY_INJECTED }
  | {
      needsDiagram: false;
      outcome: typeof SkipReasons.HAS_LOCAL_IMAGE;
      /** First reference that resolved to an existing file */
      image: string;
    }
  | {
      needsDiagram: false;
      outcome: typeof SkipReasons.UNREADABLE;
      error: string;
    };

export type SkippedReadiness = Extract<Readiness, { needsDiagram: false }>;

const REMOTE_REFERENCE = /^(?:[a-z][a-z\d+.-]*:)?\/\//i;

/**
 * Whether an image reference points at the network rather than the disk.
 */
export function isRemoteReference(src: string): boolean {
  return REMOTE_REFERENCE.test(src);
}

/**
 * Reduce a raw reference target to its path: markdown titles
 * (`img.png "Title"`) and angle brackets (`<my img.png>`) are dropped.
 */
export function normalizeReference(target: string): string {
  const trimmed = target.trim();
  const bracketed = /^<([^>]*)>/.exec(trimmed);
  if (bracketed) {
    return bracketed[1].trim();
  }
  return trimmed.replace(/\s+(?:"[^"]*"|'[^']*')\s*$/, "").trim();
}

/**
 * Decide whether a document still needs a generated diagram.
 *
 * @param content - Document text
 * @param documentDir - Directory relative references resolve against
 */
export function classifyReadiness(
  content: string,
  documentDir: string
): Readiness {
  if (content.includes(SENTINEL_MARKER)) {
    return { needsDiagram: false, outcome: SkipReasons.ALREADY_INJECTED };
  }

  for (const reference of findImageReferences(content)) {
    const src = normalizeReference(reference);
    if (!src || isRemoteReference(src)) {
      continue;
    }
    if (existsSync(resolve(documentDir, src))) {
      return {
        needsDiagram: false,
        outcome: SkipReasons.HAS_LOCAL_IMAGE,
        image: src
      };
    }
  }

  return { needsDiagram: true, outcome: "needs-diagram" };
}

/**
 * Human-readable detail for a skip, as written to the batch report.
 */
export function describeSkip(readiness: SkippedReadiness): string {
  switch (readiness.outcome) {
    case SkipReasons.ALREADY_INJECTED:
      return "Document already contains a generated diagram block";
    case SkipReasons.HAS_LOCAL_IMAGE:
      return `Document already references a local image (${readiness.image})`;
    case SkipReasons.UNREADABLE:
      return `Document could not be read: ${readiness.error}`;
  }
}
