import fs from "node:fs/promises";
import { z } from "zod";
import { IncidentRecord } from "../types/contracts.js";
import { Store, withSession } from "./store.js";

const IncidentSeed = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  description: z.string().optional(),
  severity: z.string().optional(),
  resolution: z.string().optional(),
  createdAt: z.string().datetime()
});

export async function loadIncidentSeed(file: string): Promise<IncidentRecord[]> {
  const raw: unknown = JSON.parse(await fs.readFile(file, "utf8"));
  return z.array(IncidentSeed).parse(raw);
}

/** Upserts by id, so running the seed twice leaves one copy of each incident. */
export async function seedIncidents(store: Store, incidents: IncidentRecord[]): Promise<number> {
  return withSession(store, async (s) => {
    for (const inc of incidents) await s.createIncident(inc);
    return incidents.length;
  });
}
