import type { ApplicationDetails } from "../types/index.js";
import { InvalidApplicationDetailsError } from "../errors/index.js";
import { isRecord, parseJsonDocument } from "./parse-json.js";

/**
 * Application identity read from a `VCAP_APPLICATION` style document.
 */
export class ApplicationDetailsImpl implements ApplicationDetails {
	constructor(readonly applicationName: string | null) {}

	/**
	 * @throws InvalidApplicationDetailsError on malformed input.
	 */
	static fromJson(text: string | null | undefined): ApplicationDetailsImpl {
		if (text === null || text === undefined || text.trim() === "") {
			return new ApplicationDetailsImpl(null);
		}

		const document = parseJsonDocument(text, message => new InvalidApplicationDetailsError(message));
		if (!isRecord(document)) {
			throw new InvalidApplicationDetailsError("document is not an object");
		}

		const name = document.application_name;
		return new ApplicationDetailsImpl(typeof name === "string" && name !== "" ? name : null);
	}
}
