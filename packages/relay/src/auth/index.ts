export {
  type Authenticator,
  type ConnectionMetadata,
  createPlaceholderAuthenticator,
} from "./authenticator.js";
