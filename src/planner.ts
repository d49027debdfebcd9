/**
 * Rename planning: split the mapping into chains and cycles and order the steps so that
 * every rename finds its source present and its target free.
 */

import { lstatSync } from "node:fs";
import { join } from "node:path";
import { PlanningError } from "./errors.js";
import type { RenameEntry, RenameRequest } from "./validator.js";

export type RenameStepKind = "rename" | "park" | "unpark";

/** One filesystem rename. "park" moves a file to a temporary path, "unpark" moves it on to its target. */
export interface RenameStep {
  readonly from: string;
  readonly to: string;
  readonly kind: RenameStepKind;
}

/**
 * A connected component of the mapping graph. Chain entries run head to tail;
 * cycle entries start at the break point.
 */
export type RenameGroup =
  | { readonly kind: "chain"; readonly entries: readonly RenameEntry[] }
  | { readonly kind: "cycle"; readonly entries: readonly RenameEntry[]; readonly tempName: string };

export interface RenamePlan {
  readonly request: RenameRequest;
  readonly groups: readonly RenameGroup[];
  readonly steps: readonly RenameStep[];
}

export type TempNameFn = (source: string, attempt: number) => string;

export interface PlanOptions {
  tempName?: TempNameFn;
  /** Whether a relative path is occupied outside the snapshot, e.g. by an ignored file. Defaults to checking the disk. */
  exists?: (path: string) => boolean;
}

const MAX_TEMP_ATTEMPTS = 1000;

/** `<source>.remv-<pid>-<attempt>.tmp`, next to the source. */
export const defaultTempName: TempNameFn = (source, attempt) =>
  `${source}.remv-${process.pid}-${attempt}.tmp`;

class MappingGraph {
  private readonly next = new Map<string, string>();
  private readonly prev = new Map<string, string>();

  constructor(mapping: readonly RenameEntry[]) {
    for (const { oldName, newName } of mapping) {
      this.next.set(oldName, newName);
      this.prev.set(newName, oldName);
    }
  }

  /** Walks backwards from `source`; returns the chain head, or undefined when `source` lies on a cycle. */
  chainHead(source: string): string | undefined {
    let node = source;
    for (let pred = this.prev.get(node); pred !== undefined; pred = this.prev.get(node)) {
      if (pred === source) return undefined;
      node = pred;
    }
    return node;
  }

  /** Edges from `start` following the mapping until the path ends or returns to `start`. */
  walk(start: string): RenameEntry[] {
    const entries: RenameEntry[] = [];
    let node = start;
    for (let target = this.next.get(node); target !== undefined; target = this.next.get(node)) {
      entries.push({ oldName: node, newName: target });
      if (target === start) break;
      node = target;
    }
    return entries;
  }
}

function chainSteps(entries: readonly RenameEntry[]): RenameStep[] {
  return [...entries]
    .reverse()
    .map(({ oldName, newName }): RenameStep => ({ from: oldName, to: newName, kind: "rename" }));
}

/** Park the break point, close the loop backwards, then move the parked file to its target. */
function cycleSteps(entries: readonly RenameEntry[], tempName: string): RenameStep[] {
  const [first, ...rest] = entries;
  return [
    { from: first.oldName, to: tempName, kind: "park" },
    ...chainSteps(rest),
    { from: tempName, to: first.newName, kind: "unpark" },
  ];
}

/**
 * Build the ordered rename steps for a validated request. Each cycle gets exactly one
 * temporary path; chains need none.
 */
export function buildPlan(request: RenameRequest, options: PlanOptions = {}): RenamePlan {
  const tempName = options.tempName ?? defaultTempName;
  const { root } = request.config;
  const exists =
    options.exists ?? ((path: string) => lstatSync(join(root, path), { throwIfNoEntry: false }) !== undefined);
  const graph = new MappingGraph(request.mapping);
  const taken = new Set<string>([...request.snapshot, ...request.mapping.map((e) => e.newName)]);
  const visited = new Set<string>();
  const groups: RenameGroup[] = [];
  const steps: RenameStep[] = [];
  let attempt = 0;

  const freeTempName = (source: string): string => {
    for (let tries = 0; tries < MAX_TEMP_ATTEMPTS; tries++) {
      const candidate = tempName(source, attempt++);
      if (!taken.has(candidate) && !exists(candidate)) {
        taken.add(candidate);
        return candidate;
      }
    }
    throw new PlanningError(`Could not find a free temporary name to break the cycle at "${source}".`);
  };

  // mapping is in snapshot order, so groups come out ordered by their first source
  for (const { oldName } of request.mapping) {
    if (visited.has(oldName)) continue;

    const head = graph.chainHead(oldName);
    const entries = graph.walk(head ?? oldName);
    for (const entry of entries) visited.add(entry.oldName);

    if (head === undefined) {
      const temp = freeTempName(oldName);
      groups.push({ kind: "cycle", entries, tempName: temp });
      steps.push(...cycleSteps(entries, temp));
    } else {
      groups.push({ kind: "chain", entries });
      steps.push(...chainSteps(entries));
    }
  }

  return { request, groups, steps };
}

export function countTemporarySteps(plan: RenamePlan): number {
  return plan.steps.filter((step) => step.kind === "park").length;
}
