import { z } from "zod";
import { parse as parseYaml } from "yaml";
import type { Registries } from "../validation/index.js";
import { OrchestrationError } from "../errors.js";

const entrySchema = z.union([z.string().min(1), z.object({ id: z.string().min(1) }).passthrough()]);

const registryFileSchema = z.object({
  actors: z.array(entrySchema).optional(),
  actions: z.array(entrySchema).optional()
});

export function registriesFrom(actors: Iterable<string>, actions: Iterable<string>): Registries {
  return { actors: new Set(actors), actions: new Set(actions) };
}

/** Ids listed under `kind` in a registry file (`actors: [{ id: ... }]` or plain strings). */
export function parseRegistry(text: string, kind: "actors" | "actions"): Set<string> {
  const parsed = registryFileSchema.safeParse(parseYaml(text) ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new OrchestrationError(`invalid ${kind} registry at ${issue.path.join(".") || "root"}: ${issue.message}`);
  }
  const entries = parsed.data[kind] ?? [];
  return new Set(entries.map(e => (typeof e === "string" ? e : e.id)));
}

export function loadRegistries(actorsText: string, actionsText: string): Registries {
  return { actors: parseRegistry(actorsText, "actors"), actions: parseRegistry(actionsText, "actions") };
}
