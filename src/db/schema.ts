import { sqliteTable, text } from "drizzle-orm/sqlite-core";

export const sessions = sqliteTable("sessions", {
  id: text("id").primaryKey(),
  mode: text("mode").notNull(), // "score" | "choice"
  state: text("state").notNull(), // JSON SessionState
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
});
