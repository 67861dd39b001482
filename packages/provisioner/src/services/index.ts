export { ServiceBindingsImpl } from "./service-bindings.js";
export { ApplicationDetailsImpl } from "./application-details.js";
