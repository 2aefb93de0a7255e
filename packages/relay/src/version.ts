export const RELAY_VERSION = "0.1.0";
export const RELAY_USER_AGENT = `realtime-relay/${RELAY_VERSION}`;
