export {
  buildUpstreamUrl,
  handshakeStatus,
  redactUrl,
  UPSTREAM_PATH,
  UpstreamConnector,
  type UpstreamConnectorOptions,
  type UpstreamSocketOptions,
  type WsClientFactory,
} from "./upstream-connector.js";
