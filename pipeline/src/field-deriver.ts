import type { DerivedFields, MatchResolution, RawStep, RunIssue } from "./model.ts";

const TITLE_SEPARATORS = [" – ", " - "] as const;

/**
 * The text before the earliest `" – "` or `" - "` in a title, trimmed; the whole title when
 * neither occurs. Whichever separator comes first wins, regardless of kind.
 */
export function firstHalfOfTitle(title: string): string {
  let cut = -1;
  for (const separator of TITLE_SEPARATORS) {
    const index = title.indexOf(separator);
    if (index >= 0 && (cut < 0 || index < cut)) {
      cut = index;
    }
  }

  return (cut >= 0 ? title.slice(0, cut) : title).trim();
}

export interface Narrations {
  narr1: string;
  narr2: string;
  narr3: string;
}

export function deriveNarrations(
  step: RawStep,
  resolution: MatchResolution,
  carriedNarr3: string = ""
): Narrations {
  switch (resolution.class) {
    case "M": {
      const simple = resolution.entry.narrSimple;
      return {
        narr1: simple.trim().length > 0 ? simple : firstHalfOfTitle(step.title),
        narr2: resolution.entry.narrMSimple,
        narr3: resolution.entry.narrMFull
      };
    }
    case "NON_M":
      return {
        narr1: resolution.entry.narrSimple,
        narr2: resolution.entry.narrFull,
        narr3: carriedNarr3
      };
    case "NONE":
      return { narr1: firstHalfOfTitle(step.title), narr2: "", narr3: "" };
  }
}

export interface NextDisplays {
  labels: [string, string, string];
  issues: RunIssue[];
}

/** Case-sensitive lookup of each next-step code; a code nothing answers to yields "". */
export function resolveNextDisplays(step: RawStep, titlesByCode: ReadonlyMap<string, string>): NextDisplays {
  const issues: RunIssue[] = [];
  const labels = step.nextCodes.map((nextCode, index) => {
    if (nextCode.length === 0) {
      return "";
    }

    const title = titlesByCode.get(nextCode);
    if (title === undefined) {
      issues.push({
        code: "UNRESOLVED_REFERENCE",
        rowKey: step.code,
        detail: `next${index + 1}_code "${nextCode}" does not match any RAW step`
      });
      return "";
    }

    return title;
  });

  return { labels: [labels[0] ?? "", labels[1] ?? "", labels[2] ?? ""], issues };
}

export function createTitleIndex(steps: readonly RawStep[]): Map<string, string> {
  return new Map(steps.map((step): [string, string] => [step.code, step.title]));
}

export interface DeriveFieldsContext {
  titlesByCode: ReadonlyMap<string, string>;
  carriedNarr3?: string;
}

export interface DerivedRow {
  fields: DerivedFields;
  issues: RunIssue[];
}

export function deriveFields(step: RawStep, resolution: MatchResolution, context: DeriveFieldsContext): DerivedRow {
  const narrations = deriveNarrations(step, resolution, context.carriedNarr3);
  const nextDisplays = resolveNextDisplays(step, context.titlesByCode);
  const entry = resolution.class === "NONE" ? undefined : resolution.entry;

  return {
    fields: {
      match_code_OPM: entry?.code ?? "",
      OPM_Step: entry?.opmStep ?? "",
      Source_Title: entry?.sourceTitle ?? "",
      Narr1: narrations.narr1,
      Narr2: narrations.narr2,
      Narr3: narrations.narr3,
      Disp_next1: nextDisplays.labels[0],
      Disp_next2: nextDisplays.labels[1],
      Disp_next3: nextDisplays.labels[2],
      "UAP url": "",
      "UAP Label": "",
      start_here: "No",
      Mismatch: "No"
    },
    issues: nextDisplays.issues
  };
}
