export type { AuthFlow, FlowConfig } from "./AuthFlow";
export { AuthorizationCodeFlow } from "./AuthorizationCodeFlow";
export { ClientCredentialsFlow } from "./ClientCredentialsFlow";
export { PkceFlow } from "./PkceFlow";
