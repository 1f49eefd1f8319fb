import type { ColumnType } from "kysely";

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// Owned by this package.
export interface TaskAssignees {
	task_id: number;
	user_id: number;
	created: ColumnType<Date, Date | string | undefined, never>;
}

// Owned by the host application; read here, written only for `lists.updated`.
export interface Users {
	id: number;
	username: string;
	name: string;
	email: string | null;
}

export interface Namespaces {
	id: number;
	owner_id: number;
	title: string;
}

export interface Lists {
	id: number;
	namespace_id: number;
	owner_id: number;
	title: string;
	updated: Timestamp;
}

export interface Tasks {
	id: number;
	list_id: number;
	title: string;
}

export interface ListUsers {
	list_id: number;
	user_id: number;
}

export interface TeamMembers {
	team_id: number;
	user_id: number;
}

export interface TeamLists {
	team_id: number;
	list_id: number;
}

export interface TeamNamespaces {
	team_id: number;
	namespace_id: number;
}

export interface DB {
	list_users: ListUsers;
	lists: Lists;
	namespaces: Namespaces;
	task_assignees: TaskAssignees;
	tasks: Tasks;
	team_lists: TeamLists;
	team_members: TeamMembers;
	team_namespaces: TeamNamespaces;
	users: Users;
}
