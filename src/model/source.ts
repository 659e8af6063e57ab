// src/model/source.ts
import { z } from "zod";

/**
 * Shape of a `deck gateway dump --format json` file, reduced to what the
 * migration reads. Everything is optional here: a service missing its name
 * is a per-record transform failure, not a reason to reject the whole dump.
 */
export const RouteSchema = z
  .object({
    name: z.string().nullish(),
    paths: z.array(z.string()).nullish(),
  })
  .passthrough();

export const SourceServiceSchema = z
  .object({
    name: z.string().nullish(),
    protocol: z.string().nullish(),
    host: z.string().nullish(),
    port: z.number().nullish(),
    path: z.string().nullish(),
    routes: z.array(RouteSchema).nullish(),
  })
  .passthrough();

export const SourceRecordSetSchema = z
  .object({
    _format_version: z.string().optional(),
    services: z.array(SourceServiceSchema).default([]),
  })
  .passthrough();

export type Route = z.infer<typeof RouteSchema>;
export type SourceService = z.infer<typeof SourceServiceSchema>;
export type SourceRecordSet = z.infer<typeof SourceRecordSetSchema>;
