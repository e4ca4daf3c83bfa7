export type {
  MicroformatsEntry,
  UpdateOperation,
  PostMetadata,
  TokenVerificationResult,
  SyndicationTarget,
} from './micropub.js';

export type {
  ContentValue,
  Entry,
  EntryDocument,
  EntryProperty,
  EntryPropertyKind,
  ListEntriesOptions,
  PostStatus,
  Visibility,
} from './entry.js';

export type {
  AuthorizationGrant,
  AuthorizationRequest,
  ClientInfo,
  CodeChallengeMethod,
  CodeExchangeRequest,
  GrantType,
  IntrospectionResponse,
  Profile,
  RefreshRequest,
  RefreshTokenRotation,
  ServerMetadata,
  TokenResponse,
  VerifiedToken,
} from './indieauth.js';

export type {
  IncomingMention,
  Mention,
  MentionDirection,
  MentionStatus,
  MentionSubmission,
  OutgoingMention,
  ThreadNode,
} from './webmention.js';

export type {
  HubMode,
  PublishResult,
  SignatureAlgorithm,
  Subscription,
  SubscriptionRequest,
  SubscriptionResult,
  TopicRenderer,
  TopicRepresentation,
} from './websub.js';

export type {
  SiteConfig,
  DatabaseConfig,
  MicropubConfig,
  IndieAuthConfig,
  WebMentionConfig,
  WebSubConfig,
  HttpConfig,
  DiscoveryConfig,
  SecurityConfig,
  IndieHubConfig,
  ResolvedConfig,
} from './config.js';
