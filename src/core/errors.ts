export class AssignmentError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "AssignmentError";
	}
}

export class AccessDeniedError extends AssignmentError {
	readonly containerId: number;
	readonly principalId: number;

	constructor(containerId: number, principalId: number) {
		super(`User ${principalId} does not have access to list ${containerId}`);
		this.name = "AccessDeniedError";
		this.containerId = containerId;
		this.principalId = principalId;
	}
}

export class ForbiddenError extends AssignmentError {
	constructor(workItemId: number, callerId: number) {
		super(`User ${callerId} may not read the assignees of task ${workItemId}`);
		this.name = "ForbiddenError";
	}
}

export class NotFoundError extends AssignmentError {
	constructor(message: string) {
		super(message);
		this.name = "NotFoundError";
	}
}

export class WorkItemNotFoundError extends NotFoundError {
	constructor(workItemId: number) {
		super(`Task ${workItemId} does not exist`);
		this.name = "WorkItemNotFoundError";
	}
}

export class PrincipalNotFoundError extends NotFoundError {
	constructor(principalId: number) {
		super(`User ${principalId} does not exist`);
		this.name = "PrincipalNotFoundError";
	}
}

export class ContainerNotFoundError extends NotFoundError {
	constructor(containerId: number) {
		super(`List ${containerId} does not exist`);
		this.name = "ContainerNotFoundError";
	}
}

export class ConflictError extends AssignmentError {
	constructor(workItemId: number, principalId: number) {
		super(`User ${principalId} is already assigned to task ${workItemId}`);
		this.name = "ConflictError";
	}
}

export class ValidationError extends AssignmentError {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid request: ${issues.join("; ")}`);
		this.name = "ValidationError";
		this.issues = issues;
	}
}

export class PersistenceError extends AssignmentError {
	override cause: unknown;
	constructor(operation: string, cause: unknown) {
		super(`Persistence failure during '${operation}': ${cause}`);
		this.name = "PersistenceError";
		this.cause = cause;
	}
}
