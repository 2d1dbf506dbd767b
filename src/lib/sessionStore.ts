/**
 * Session snapshots kept between requests, plus the optional flat-file
 * autosave of the session's CSV export.
 */

import fs from "fs";
import path from "path";
import { eq } from "drizzle-orm";
import { db, schema } from "@/db";
import { exportSessionCsv } from "./export";
import type { SessionState } from "./session";

export function loadSession(sessionId: string): SessionState | null {
  const row = db
    .select()
    .from(schema.sessions)
    .where(eq(schema.sessions.id, sessionId))
    .get();
  if (!row) return null;
  const state: SessionState = JSON.parse(row.state);
  return state;
}

export function saveSession(state: SessionState, now: Date = new Date()): void {
  const stamp = now.toISOString();
  const serialized = JSON.stringify(state);
  db.insert(schema.sessions)
    .values({
      id: state.id,
      mode: state.scale,
      state: serialized,
      createdAt: stamp,
      updatedAt: stamp,
    })
    .onConflictDoUpdate({
      target: schema.sessions.id,
      set: { state: serialized, updatedAt: stamp },
    })
    .run();
}

/** Write the session's CSV export to autosavePath, when one is configured. */
export function autosave(state: SessionState, autosavePath: string | null): boolean {
  if (!autosavePath) return false;
  fs.mkdirSync(path.dirname(autosavePath), { recursive: true });
  fs.writeFileSync(autosavePath, exportSessionCsv(state), "utf-8");
  return true;
}
