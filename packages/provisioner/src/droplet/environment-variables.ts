import type { EnvironmentAssignment } from "@agent-provisioner/shared";
import type { EnvironmentVariableSink } from "../types/index.js";

/**
 * Environment variables set on the application at launch, in insertion order.
 */
export class EnvironmentVariablesImpl implements EnvironmentVariableSink {
	private readonly assignments: EnvironmentAssignment[] = [];

	append(key: string, value: string): void {
		this.assignments.push({ key, value });
	}

	entries(): readonly EnvironmentAssignment[] {
		return [...this.assignments];
	}

	toString(): string {
		return this.assignments.map(({ key, value }) => `${key}=${value}`).join("\n");
	}
}
