// src/model/mapper.ts
import { SourceRecordSet, SourceService } from "./source";
import { buildDefinition, TargetDefinition } from "./target";
import { logger } from "../utils/logger";

/** A source record that could not be turned into a definition. */
export type TransformIssue = {
  index: number;
  id: string;
  reason: string;
};

export type TransformResult = {
  definitions: TargetDefinition[];
  /** `services[]` position of each definition */
  sourceIndexes: number[];
  issues: TransformIssue[];
};

/**
 * Map a Kong dump to Tyk OAS definitions, one per service, in input order.
 * Only the first path of the first route becomes the listen path; other
 * routes and paths are not migrated.
 */
export function transformServices(recordSet: SourceRecordSet): TransformResult {
  const definitions: TargetDefinition[] = [];
  const sourceIndexes: number[] = [];
  const issues: TransformIssue[] = [];

  recordSet.services.forEach((svc, index) => {
    const title = svc.name ?? "";
    if (!title.trim()) {
      issues.push({ index, id: `services[${index}]`, reason: "service has no name" });
      return;
    }

    const listenPath = firstListenPath(svc);
    if (listenPath === null) {
      logger.warn(`Service "${title}" has no route path; its definition will not be importable`);
    }

    definitions.push(
      buildDefinition({
        title,
        listenPath,
        upstreamURL: upstreamUrl(svc),
      })
    );
    sourceIndexes.push(index);
  });

  logger.debug(`Mapped ${definitions.length} services, ${issues.length} skipped`);
  return { definitions, sourceIndexes, issues };
}

function firstListenPath(svc: SourceService): string | null {
  const route = svc.routes?.[0];
  return route?.paths?.[0] ?? null;
}

// verbatim concatenation: no slash cleanup, no URL validation
export function upstreamUrl(svc: SourceService): string {
  return `${svc.protocol ?? ""}://${svc.host ?? ""}${svc.path ?? ""}`;
}
