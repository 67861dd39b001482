export { EnvironmentBuilderImpl } from "./environment-builder.js";
export { NAMED_FIELD_RULES, PROXY_RULES, namedFieldValue, type NamedFieldRule, type ProxyRule } from "./rules.js";
