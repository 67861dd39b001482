export { createDroplet, defaultSandboxDir, type DropletOptions } from "./droplet.js";
export { EnvironmentVariablesImpl } from "./environment-variables.js";
export { LaunchOptionSetImpl } from "./launch-options.js";
export { qualifyPath } from "./qualify-path.js";
