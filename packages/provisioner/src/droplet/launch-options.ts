import type { LaunchOption } from "@agent-provisioner/shared";
import { LAUNCH_OPTION_KIND } from "@agent-provisioner/shared";
import type { LaunchOptionSet } from "../types/index.js";

const SYSTEM_PROPERTY_FLAG = "-D";

function render(option: LaunchOption): string {
	return option.kind === LAUNCH_OPTION_KIND.PROPERTY
		? `${SYSTEM_PROPERTY_FLAG}${option.key}=${option.value}`
		: option.value;
}

const SHELL_QUOTES = /^["']+|["']+$/g;

/**
 * Property keys set by a preformatted option. One preformatted entry may
 * hold several flags, as a user's `JAVA_OPTS` usually does, and a flag may be
 * shell-quoted when its value has spaces.
 */
function propertyKeys(option: LaunchOption): string[] {
	if (option.kind === LAUNCH_OPTION_KIND.PROPERTY) {
		return [option.key];
	}
	return option.value
		.split(/\s+/)
		.map(token => token.replace(SHELL_QUOTES, ""))
		.filter(token => token.startsWith(SYSTEM_PROPERTY_FLAG))
		.map(token => token.slice(SYSTEM_PROPERTY_FLAG.length).split("=")[0]);
}

/**
 * Launch options of the application, in the order they were added.
 */
export class LaunchOptionSetImpl implements LaunchOptionSet {
	private readonly options: LaunchOption[];

	constructor(existing: readonly string[] = []) {
		this.options = existing
			.filter(value => value.trim() !== "")
			.map(value => ({ kind: LAUNCH_OPTION_KIND.PREFORMATTED, value }));
	}

	contains(pattern: string | RegExp): boolean {
		if (typeof pattern === "string") {
			return this.options.some(option => render(option).includes(pattern));
		}
		const regex = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
		return this.options.some(option => regex.test(render(option)));
	}

	hasProperty(key: string): boolean {
		return this.options.some(option => propertyKeys(option).includes(key));
	}

	appendPreformatted(value: string): void {
		this.options.push({ kind: LAUNCH_OPTION_KIND.PREFORMATTED, value });
	}

	appendProperty(key: string, value: string): void {
		this.options.push({ kind: LAUNCH_OPTION_KIND.PROPERTY, key, value });
	}

	toArray(): readonly LaunchOption[] {
		return [...this.options];
	}

	toString(): string {
		return this.options.map(render).join(" ");
	}
}
