import type { Pool } from "pg";
import pool from "../db/connection.js";
import type { ProgramExerciseNameRow } from "../db/types.js";

type Queryable = Pick<Pool, "query">;

/**
 * Canonical exercise names of the user's active program, in program order:
 * latest version, days by sort_order (workout A→E), then exercises by
 * sort_order within each day. An exercise that appears on several days keeps
 * its first position, since the matcher breaks ties by list order.
 *
 * Returns [] when the user has no active program.
 */
export async function getProgramExercises(
  userId: string,
  client: Queryable = pool
): Promise<string[]> {
  const { rows } = await client.query<ProgramExerciseNameRow>(
    `WITH latest AS (
       SELECT pv.id
       FROM programs p
       JOIN program_versions pv ON pv.program_id = p.id
       WHERE p.user_id = $1 AND p.is_active = TRUE
       ORDER BY pv.version_number DESC
       LIMIT 1
     )
     SELECT e.name
     FROM latest
     JOIN program_days pd ON pd.version_id = latest.id
     JOIN program_day_exercises pde ON pde.day_id = pd.id
     JOIN exercises e ON e.id = pde.exercise_id
     ORDER BY pd.sort_order, pde.sort_order, pde.id`,
    [userId]
  );

  const seen = new Set<string>();
  const names: string[] = [];
  for (const { name } of rows) {
    if (seen.has(name)) continue;
    seen.add(name);
    names.push(name);
  }
  return names;
}
