import { describe, expect, it } from "vitest";
import { CredentialSet, stringifyCredential } from "../credentials/credential-set.js";
import { MissingCredentialError } from "../errors/index.js";
import { createTestCredentials } from "./test-utils.js";

describe("CredentialSet", () => {
	describe("from", () => {
		it("reads the required fields", () => {
			const credentials = CredentialSet.from(createTestCredentials());

			expect(credentials.known.apiKey).toBe("k1");
			expect(credentials.known.serviceKey).toBe("s1");
			expect(credentials.known.teamserverUrl).toBe("https://h");
			expect(credentials.known.username).toBe("u1");
		});

		it("keeps proxy fields as raw values", () => {
			const credentials = CredentialSet.from(createTestCredentials({ proxy_host: "ph", proxy_port: 8080 }));

			expect(credentials.known.proxyHost).toBe("ph");
			expect(credentials.known.proxyPort).toBe(8080);
			expect(credentials.known.proxyUser).toBeUndefined();
		});

		it("collects CONTRAST__ keys in binding order", () => {
			const credentials = CredentialSet.from(createTestCredentials({
				CONTRAST__INVENTORY__LIBRARY_DIRS: "/lib/dir",
				contrast__lower: "ignored",
				CONTRAST__API__TIMEOUT_MS: 30000,
				NOT_CONTRAST__X: "ignored",
			}));

			expect([...credentials.passthrough]).toEqual([
				["CONTRAST__INVENTORY__LIBRARY_DIRS", "/lib/dir"],
				["CONTRAST__API__TIMEOUT_MS", "30000"],
			]);
		});

		it("throws MissingCredentialError naming every missing key", () => {
			const attempt = (): CredentialSet => CredentialSet.from({ api_key: "k1", username: "u1" });

			expect(attempt).toThrow(MissingCredentialError);
			expect(attempt).toThrow("Missing required credentials: service_key, teamserver_url");

			let caught: unknown;
			try {
				attempt();
			} catch (err) {
				caught = err;
			}
			expect(caught instanceof MissingCredentialError && caught.missingKeys).toEqual(["service_key", "teamserver_url"]);
			expect(caught instanceof MissingCredentialError && caught.code).toBe("MISSING_CREDENTIAL");
		});

		it("accepts a required key present with a null value", () => {
			const credentials = CredentialSet.from(createTestCredentials({ username: null }));

			expect(credentials.known.username).toBe("");
		});

		it("is frozen", () => {
			const credentials = CredentialSet.from(createTestCredentials());

			expect(Object.isFrozen(credentials)).toBe(true);
			expect(Object.isFrozen(credentials.known)).toBe(true);
		});
	});

	describe("stringifyCredential", () => {
		it("renders null and undefined as empty", () => {
			expect(stringifyCredential(null)).toBe("");
			expect(stringifyCredential(undefined)).toBe("");
		});

		it("keeps falsy-looking scalars", () => {
			expect(stringifyCredential(0)).toBe("0");
			expect(stringifyCredential(false)).toBe("false");
			expect(stringifyCredential("")).toBe("");
		});
	});
});
