import type { Flow } from "./flow.js";

export interface Artifact {
  format: string;
  content: string;
  mediaType?: string;
}

/** Capability a renderer (Markdown, JSON, diagram XML, ...) provides to the core. */
export interface Exporter {
  format: string;
  export(flow: Flow): Artifact;
}

export type ExporterRegistry = ReadonlyMap<string, Exporter>;
