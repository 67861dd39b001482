import { describe, expect, it } from "vitest";
import {
	EnvironmentVariablesImpl,
	LaunchOptionSetImpl,
	createDroplet,
	defaultSandboxDir,
	qualifyPath,
} from "../droplet/index.js";

describe("LaunchOptionSetImpl", () => {
	it("starts from existing options, skipping blanks", () => {
		const options = new LaunchOptionSetImpl(["-Xmx512m", "  ", "-Dfoo=bar"]);

		expect(options.toString()).toBe("-Xmx512m -Dfoo=bar");
	});

	it("renders properties as -Dkey=value in insertion order", () => {
		const options = new LaunchOptionSetImpl();
		options.appendPreformatted("-javaagent:$PWD/agent.jar");
		options.appendProperty("contrast.override.appname", "NAME_ALREADY_OVERRIDDEN");

		expect(options.toString()).toBe("-javaagent:$PWD/agent.jar -Dcontrast.override.appname=NAME_ALREADY_OVERRIDDEN");
		expect(options.toArray()).toEqual([
			{ kind: "PREFORMATTED", value: "-javaagent:$PWD/agent.jar" },
			{ kind: "PROPERTY", key: "contrast.override.appname", value: "NAME_ALREADY_OVERRIDDEN" },
		]);
	});

	describe("contains", () => {
		it("matches substrings of rendered options", () => {
			const options = new LaunchOptionSetImpl();
			options.appendProperty("contrast.application.name", "x");

			expect(options.contains("contrast.application.name")).toBe(true);
			expect(options.contains(/application\.name=x$/)).toBe(true);
			expect(options.contains("contrast.override.appname")).toBe(false);
		});
	});

	describe("hasProperty", () => {
		it("finds typed properties by key", () => {
			const options = new LaunchOptionSetImpl();
			options.appendProperty("contrast.override.appname", "x");

			expect(options.hasProperty("contrast.override.appname")).toBe(true);
		});

		it("finds properties inside a preformatted option string", () => {
			const options = new LaunchOptionSetImpl(["-Xss1m -Dcontrast.application.name=store -Xmx1g"]);

			expect(options.hasProperty("contrast.application.name")).toBe(true);
		});

		it("finds a property set without a value", () => {
			const options = new LaunchOptionSetImpl(["-Dcontrast.override.appname"]);

			expect(options.hasProperty("contrast.override.appname")).toBe(true);
		});

		it("finds a shell-quoted property whose value has spaces", () => {
			const options = new LaunchOptionSetImpl(["-Xmx1g \"-Dcontrast.application.name=My App\""]);

			expect(options.hasProperty("contrast.application.name")).toBe(true);
		});

		it("finds a quoted property set without a value", () => {
			const options = new LaunchOptionSetImpl(["'-Dcontrast.override.appname'"]);

			expect(options.hasProperty("contrast.override.appname")).toBe(true);
		});

		it("does not match a key that only appears in a value", () => {
			const options = new LaunchOptionSetImpl(["-Dnote=contrast.application.name"]);

			expect(options.contains("contrast.application.name")).toBe(true);
			expect(options.hasProperty("contrast.application.name")).toBe(false);
		});

		it("does not match a longer key with the same prefix", () => {
			const options = new LaunchOptionSetImpl(["-Dcontrast.application.name.suffix=x"]);

			expect(options.hasProperty("contrast.application.name")).toBe(false);
		});
	});
});

describe("EnvironmentVariablesImpl", () => {
	it("keeps assignments in insertion order", () => {
		const env = new EnvironmentVariablesImpl();
		env.append("B", "2");
		env.append("A", "1");

		expect(env.entries()).toEqual([{ key: "B", value: "2" }, { key: "A", value: "1" }]);
		expect(env.toString()).toBe("B=2\nA=1");
	});

	it("returns a copy of its entries", () => {
		const env = new EnvironmentVariablesImpl();
		env.append("A", "1");
		const snapshot = env.entries();
		env.append("B", "2");

		expect(snapshot).toHaveLength(1);
	});
});

describe("qualifyPath", () => {
	it("expresses a sandbox path relative to $PWD", () => {
		expect(qualifyPath(
			"/home/vcap/app/.java-buildpack/contrast_security_agent/contrast-engine-0.0.0.jar",
			"/home/vcap/app",
		)).toBe("$PWD/.java-buildpack/contrast_security_agent/contrast-engine-0.0.0.jar");
	});

	it("walks up for paths outside the root", () => {
		expect(qualifyPath("/home/vcap/deps/agent.jar", "/home/vcap/app")).toBe("$PWD/../deps/agent.jar");
	});
});

describe("createDroplet", () => {
	it("places the sandbox under the application root by default", () => {
		const droplet = createDroplet({ root: "/home/vcap/app" });

		expect(droplet.sandbox).toBe("/home/vcap/app/.java-buildpack/contrast_security_agent");
		expect(defaultSandboxDir("/app")).toBe("/app/.java-buildpack/contrast_security_agent");
	});

	it("seeds launch options from existing java opts", () => {
		const droplet = createDroplet({ root: "/app", sandbox: "/tmp/agent", javaOpts: ["-Xmx1g"] });

		expect(droplet.sandbox).toBe("/tmp/agent");
		expect(droplet.launchOptions.toString()).toBe("-Xmx1g");
		expect(droplet.environmentVariables.entries()).toEqual([]);
	});
});
