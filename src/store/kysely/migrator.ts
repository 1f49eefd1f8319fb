import { type Kysely, type Migration, Migrator } from "kysely";
import { PersistenceError } from "../../core/errors.ts";
import * as createTaskAssignees from "./migrations/20240101000000_create_task_assignees.ts";

// kysely-ctl reads the migrations folder directly; this list serves
// in-process migration (tests, embedded deployments).
const migrations: Record<string, Migration> = {
	"20240101000000_create_task_assignees": createTaskAssignees,
};

export async function migrateToLatest<T>(db: Kysely<T>): Promise<string[]> {
	const migrator = new Migrator({
		db,
		provider: { getMigrations: async () => migrations },
	});
	const { error, results } = await migrator.migrateToLatest();
	if (error) {
		throw new PersistenceError("migrateToLatest", error);
	}
	return (results ?? [])
		.filter((result) => result.status === "Success")
		.map((result) => result.migrationName);
}
