import { type Kysely, sql } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
	await db.schema
		.createTable("task_assignees")
		.addColumn("task_id", "bigint", (col) => col.notNull())
		.addColumn("user_id", "bigint", (col) => col.notNull())
		.addColumn("created", "timestamptz", (col) =>
			col.notNull().defaultTo(sql`CURRENT_TIMESTAMP`),
		)
		.addPrimaryKeyConstraint("task_assignees_pkey", ["task_id", "user_id"])
		.execute();

	await db.schema
		.createIndex("task_assignees_user_id_idx")
		.on("task_assignees")
		.column("user_id")
		.execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
	await db.schema.dropTable("task_assignees").execute();
}
