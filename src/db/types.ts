/**
 * Database row types for the query results read in this service.
 */

export interface ProgramExerciseNameRow {
  name: string;
}

export interface MigrationRow {
  name: string;
}
