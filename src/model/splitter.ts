// src/model/splitter.ts
import { TargetDefinition, titleOf } from "./target";
import { keyIdentity, unitKey } from "../adapters/tyk/naming";
import { DuplicateTitleError } from "../errors";
import { logger } from "../utils/logger";

export type DuplicatePolicy = "suffix" | "reject";

export type Unit = {
  key: string;
  definition: TargetDefinition;
  /** position in the combined definitions list */
  index: number;
  /** position of the originating service in the dump's `services` */
  sourceIndex: number;
};

export type SplitOpts = {
  onDuplicate?: DuplicatePolicy;
  /** source position per definition; defaults to the definition's own index */
  sourceIndexes?: readonly number[];
};

/**
 * Produce one unit per definition, keyed by its sanitized title.
 * Duplicate keys are either rejected up front or disambiguated with a
 * numeric suffix (`svc-a`, `svc-a-2`, ...) in emission order.
 */
export function splitDefinitions(definitions: readonly TargetDefinition[], opts: SplitOpts = {}): Unit[] {
  const onDuplicate = opts.onDuplicate ?? "suffix";
  const baseKeys = definitions.map((d) => unitKey(titleOf(d)));

  const counts = new Map<string, number>();
  for (const k of baseKeys) counts.set(keyIdentity(k), (counts.get(keyIdentity(k)) ?? 0) + 1);
  const duplicated = definitions
    .filter((_, i) => (counts.get(keyIdentity(baseKeys[i])) ?? 0) > 1)
    .map(titleOf);

  if (duplicated.length && onDuplicate === "reject") {
    throw new DuplicateTitleError([...new Set(duplicated)]);
  }

  const taken = new Set<string>();
  const units: Unit[] = [];
  definitions.forEach((definition, index) => {
    let key = baseKeys[index];
    if (taken.has(keyIdentity(key))) {
      let n = 2;
      while (taken.has(keyIdentity(`${key}-${n}`)) || counts.has(keyIdentity(`${key}-${n}`))) n++;
      logger.warn(`Duplicate title "${titleOf(definition)}": using key ${key}-${n}`);
      key = `${key}-${n}`;
    }
    taken.add(keyIdentity(key));
    units.push({ key, definition, index, sourceIndex: opts.sourceIndexes?.[index] ?? index });
  });

  return units;
}
