export const USER_AGENT = 'dev-profile-mcp';

// Applied to every outbound request; expiry surfaces as an upstream failure
export const REQUEST_TIMEOUT_MS = 10_000;
