import type { CredentialValue, ServiceBinding, ServiceCredentials } from "@agent-provisioner/shared";
import type { ServiceBindings } from "../types/index.js";
import { InvalidServiceBindingsError } from "../errors/index.js";
import { isRecord, parseJsonDocument } from "./parse-json.js";

function toCredentialValue(value: unknown): CredentialValue {
	if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
		return value;
	}
	return JSON.stringify(value) ?? null;
}

function toBinding(label: string, entry: unknown, index: number): ServiceBinding {
	if (!isRecord(entry)) {
		throw new InvalidServiceBindingsError(`${label}[${index}] is not an object`);
	}
	const credentials = entry.credentials ?? {};
	if (!isRecord(credentials)) {
		throw new InvalidServiceBindingsError(`${label}[${index}].credentials is not an object`);
	}
	const tags: unknown = entry.tags ?? [];
	if (!Array.isArray(tags)) {
		throw new InvalidServiceBindingsError(`${label}[${index}].tags is not an array`);
	}

	const normalized: Record<string, CredentialValue> = {};
	for (const [key, value] of Object.entries(credentials)) {
		normalized[key] = toCredentialValue(value);
	}

	return {
		name: typeof entry.name === "string" ? entry.name : "",
		label: typeof entry.label === "string" ? entry.label : label,
		tags: tags.filter((tag: unknown): tag is string => typeof tag === "string"),
		credentials: normalized,
	};
}

/**
 * Services bound to the application, read from a `VCAP_SERVICES` style document.
 */
export class ServiceBindingsImpl implements ServiceBindings {
	constructor(private readonly bindings: readonly ServiceBinding[]) {}

	/**
	 * Parse a bindings document. Empty or absent input means nothing is bound.
	 * @throws InvalidServiceBindingsError on malformed input.
	 */
	static fromJson(text: string | null | undefined): ServiceBindingsImpl {
		if (text === null || text === undefined || text.trim() === "") {
			return new ServiceBindingsImpl([]);
		}

		const document = parseJsonDocument(text, message => new InvalidServiceBindingsError(message));
		if (!isRecord(document)) {
			throw new InvalidServiceBindingsError("document is not an object");
		}

		const bindings: ServiceBinding[] = [];
		for (const [label, entries] of Object.entries(document)) {
			if (!Array.isArray(entries)) {
				throw new InvalidServiceBindingsError(`${label} is not an array`);
			}
			entries.forEach((entry: unknown, index) => bindings.push(toBinding(label, entry, index)));
		}
		return new ServiceBindingsImpl(bindings);
	}

	countMatching(filter: RegExp, ...requiredKeys: string[]): number {
		return this.matching(filter, requiredKeys).length;
	}

	find(filter: RegExp, ...requiredKeys: string[]): ServiceCredentials | null {
		const matches = this.matching(filter, requiredKeys);
		return matches.length === 1 ? matches[0].credentials : null;
	}

	oneService(filter: RegExp, ...requiredKeys: string[]): boolean {
		return this.countMatching(filter, ...requiredKeys) === 1;
	}

	private matching(filter: RegExp, requiredKeys: readonly string[]): ServiceBinding[] {
		return this.bindings.filter(binding =>
			this.matchesFilter(binding, filter) &&
			requiredKeys.every(key => Object.hasOwn(binding.credentials, key)),
		);
	}

	private matchesFilter(binding: ServiceBinding, filter: RegExp): boolean {
		// A global or sticky filter would carry lastIndex between calls
		const pattern = new RegExp(filter.source, filter.flags.replace(/[gy]/g, ""));
		return [binding.name, binding.label, ...binding.tags].some(value => pattern.test(value));
	}
}
