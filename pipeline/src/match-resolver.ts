import type { ManualMapEntry, MatchResolution, NarrEntry, RawStep } from "./model.ts";

export const DEFAULT_M_CLASS_PREFIX = "M";

export type MatchResolutionErrorCode = "AMBIGUOUS_MATCH";

export class MatchResolutionError extends Error {
  readonly code: MatchResolutionErrorCode;
  readonly rawCode: string;
  readonly matchToken: string;
  readonly candidateCodes: string[];

  constructor(params: { rawCode: string; matchToken: string; candidateCodes: string[] }) {
    super(
      `Manual map token "${params.matchToken}" for ${params.rawCode} matches OPM_Step of ${params.candidateCodes.join(", ")}`
    );
    this.name = "MatchResolutionError";
    this.code = "AMBIGUOUS_MATCH";
    this.rawCode = params.rawCode;
    this.matchToken = params.matchToken;
    this.candidateCodes = params.candidateCodes;
  }
}

export interface NarrCatalog {
  entries: readonly NarrEntry[];
  byCode: ReadonlyMap<string, NarrEntry>;
  byOpmStep: ReadonlyMap<string, readonly NarrEntry[]>;
}

export function createNarrCatalog(entries: readonly NarrEntry[]): NarrCatalog {
  const byCode = new Map<string, NarrEntry>();
  const byOpmStep = new Map<string, NarrEntry[]>();

  for (const entry of entries) {
    byCode.set(entry.code, entry);

    const opmStep = entry.opmStep.trim();
    if (opmStep.length === 0) {
      continue;
    }

    const sharing = byOpmStep.get(opmStep);
    if (sharing) {
      sharing.push(entry);
    } else {
      byOpmStep.set(opmStep, [entry]);
    }
  }

  return { entries, byCode, byOpmStep };
}

export function isMClassCode(code: string, mClassPrefix: string = DEFAULT_M_CLASS_PREFIX): boolean {
  const prefix = mClassPrefix.trim().toUpperCase();
  return prefix.length > 0 && code.trim().toUpperCase().startsWith(prefix);
}

export interface ResolveMatchOptions {
  mClassPrefix?: string;
}

/**
 * Resolves which narration entry applies to a step. Only the manual map decides: its token is
 * looked up as a narration code first, then as an `OPM_Step` value that must be unique.
 */
export function resolveMatch(
  step: RawStep,
  catalog: NarrCatalog,
  mapEntry: ManualMapEntry | undefined,
  options: ResolveMatchOptions = {}
): MatchResolution {
  if (!mapEntry) {
    return { class: "NONE", reason: "NO_MAP_ENTRY" };
  }

  const token = mapEntry.matchToken.trim();
  if (token.length === 0) {
    return { class: "NONE", reason: "BLANK_TOKEN" };
  }

  let entry = catalog.byCode.get(token);
  if (!entry) {
    const sharing = catalog.byOpmStep.get(token) ?? [];
    if (sharing.length > 1) {
      throw new MatchResolutionError({
        rawCode: step.code,
        matchToken: token,
        candidateCodes: sharing.map((candidate) => candidate.code)
      });
    }
    entry = sharing[0];
  }

  if (!entry) {
    return { class: "NONE", reason: "UNMATCHED_TOKEN" };
  }

  return isMClassCode(entry.code, options.mClassPrefix) ? { class: "M", entry } : { class: "NON_M", entry };
}
