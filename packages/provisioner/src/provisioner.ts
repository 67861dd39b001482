import * as path from "node:path";
import type { ResolvedArtifact } from "@agent-provisioner/shared";
import { AGENT_ID, DEFAULT_APPLICATION_NAME, REQUIRED_CREDENTIAL_KEYS, SERVICE_FILTER } from "@agent-provisioner/shared";
import type {
	AgentProvisioner,
	ApplicationDetails,
	ArtifactInstaller,
	Droplet,
	EnvironmentBuilder,
	Logger,
	ReleaseResult,
	ServiceBindings,
	VersionResolver,
} from "./types/index.js";
import { CredentialSet } from "./credentials/credential-set.js";
import { qualifyPath } from "./droplet/index.js";
import { MissingArtifactUriError, ServiceNotBoundError } from "./errors/index.js";
import { selectArtifactName } from "./version/index.js";

const REQUIRED_KEYS = Object.values(REQUIRED_CREDENTIAL_KEYS);

/**
 * Provisions the Contrast Security Java agent into a droplet.
 */
export class AgentProvisionerImpl implements AgentProvisioner {
	private resolved: ResolvedArtifact | null = null;

	constructor(
		private readonly logger: Logger,
		private readonly services: ServiceBindings,
		private readonly applicationDetails: ApplicationDetails,
		private readonly droplet: Droplet,
		private readonly versionResolver: VersionResolver,
		private readonly artifactInstaller: ArtifactInstaller,
		private readonly environmentBuilder: EnvironmentBuilder,
	) {}

	supports(): boolean {
		return this.services.oneService(SERVICE_FILTER, ...REQUIRED_KEYS);
	}

	detect(): string | null {
		if (!this.supports()) {
			this.logger.debug(`No single service matching ${SERVICE_FILTER.source} with ${REQUIRED_KEYS.join(", ")}`);
			return null;
		}
		return `${AGENT_ID}=${this.artifact().version.raw}`;
	}

	compile(): void {
		const { version, uri } = this.artifact();
		if (uri === null) {
			throw new MissingArtifactUriError();
		}
		const artifactName = selectArtifactName(version);

		this.logger.info(`Installing ${artifactName} into ${this.droplet.sandbox}`);
		this.artifactInstaller.install(uri, this.droplet.sandbox, artifactName);
	}

	release(): ReleaseResult {
		const raw = this.services.find(SERVICE_FILTER, ...REQUIRED_KEYS);
		if (raw === null) {
			throw new ServiceNotBoundError(SERVICE_FILTER, this.services.countMatching(SERVICE_FILTER, ...REQUIRED_KEYS));
		}
		const credentials = CredentialSet.from(raw);

		const artifactPath = path.join(this.droplet.sandbox, selectArtifactName(this.artifact().version));
		const launchOption = `-javaagent:${qualifyPath(artifactPath, this.droplet.root)}`;
		this.droplet.launchOptions.appendPreformatted(launchOption);

		const environment = this.environmentBuilder.build(
			credentials,
			this.droplet.launchOptions,
			this.applicationName(),
		);
		for (const { key, value } of environment) {
			this.droplet.environmentVariables.append(key, value);
		}

		this.logger.info(`Released ${launchOption} with ${environment.length} environment variables`);
		return { launchOption, environment };
	}

	/**
	 * Resolve the artifact once per run; compile and release must agree on it.
	 */
	private artifact(): ResolvedArtifact {
		if (this.resolved === null) {
			this.resolved = this.versionResolver.resolve();
			this.logger.debug(`Resolved agent version ${this.resolved.version.raw}`);
		}
		return this.resolved;
	}

	private applicationName(): string {
		return this.applicationDetails.applicationName || DEFAULT_APPLICATION_NAME;
	}
}
