import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse as yamlParse } from "yaml";
import { z } from "zod";
import { getPackageRoot } from "../utils/platform.js";

export const personaColorEnum = z.enum(["blue", "orange", "green", "purple", "red", "teal"]);

/** Validates one persona entry of data/personas.yaml. */
export const personaSchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1),
  capabilities: z.array(z.string()).default([]),
  defaultContext: z.string().min(1),
  color: personaColorEnum,
  specializations: z.array(z.string()).default([]),
});

/** Validates the whole catalog; the default must name a listed persona. */
export const personaCatalogSchema = z
  .object({
    defaultPersona: z.string().min(1),
    personas: z.record(personaSchema),
  })
  .refine((c) => Object.hasOwn(c.personas, c.defaultPersona), {
    message: "defaultPersona must name a persona in the catalog",
    path: ["defaultPersona"],
  });

export type PersonaColor = z.infer<typeof personaColorEnum>;
export type Persona = z.infer<typeof personaSchema>;
export type PersonaCatalog = z.infer<typeof personaCatalogSchema>;

export function catalogPath(): string {
  return join(getPackageRoot(), "data", "personas.yaml");
}

let cached: PersonaCatalog | undefined;

/** Load and validate the bundled catalog (cached after the first read). */
export async function loadPersonaCatalog(): Promise<PersonaCatalog> {
  if (cached) return cached;
  const raw = await readFile(catalogPath(), "utf-8");
  cached = parsePersonaCatalog(raw);
  return cached;
}

export function parsePersonaCatalog(yamlText: string): PersonaCatalog {
  const data: unknown = yamlParse(yamlText);
  return personaCatalogSchema.parse(data);
}

/** Own entries only, so ids such as `constructor` are not found. */
export function findPersona(catalog: PersonaCatalog, id: string): Persona | undefined {
  return Object.hasOwn(catalog.personas, id) ? catalog.personas[id] : undefined;
}

export function personaIds(catalog: PersonaCatalog): string[] {
  return Object.keys(catalog.personas);
}
