import type { DatabaseHandle, IndieHubDatabase } from "./storage/database.js";
import { openDatabase } from "./storage/database.js";
import { EntryStore } from "./storage/entry-store.js";
import { getVisibility } from "./lib/content.js";
import { EntryEvents, type EntryEvent, type EntryEventType } from "./lib/events.js";
import { HttpClient, type Fetch } from "./lib/http.js";
import { createConsoleLogger, type Logger } from "./lib/logger.js";
import { BackgroundTasks } from "./lib/tasks.js";
import { TokenService } from "./services/token-service.js";
import { TrustedDomains } from "./services/trusted-domains.js";
import { WebMentionPipeline } from "./services/webmention.js";
import { WebSubHub } from "./services/websub-hub.js";
import type { ResolvedConfig } from "./types/config.js";
import type { AuthorizationGrant, AuthorizationRequest } from "./types/indieauth.js";
import type { TopicRenderer } from "./types/websub.js";
import { validateConfig, type IndieHubOptions } from "./validators/config.js";

/**
 * What the consent screen needs to ask the owner
 */
export interface ConsentRequest {
  grant: AuthorizationGrant;
  request: AuthorizationRequest;
  /** Where the consent form posts the (possibly narrowed) scope */
  approveUrl: string;
}

/**
 * Collaborators the host application provides
 */
export interface IndieWebDependencies {
  fetch?: Fetch;
  now?: () => Date;
  logger?: Logger;
  /** Current representation of a WebSub topic; defaults to fetching it */
  renderTopic?: TopicRenderer;
  /** Whether the request comes from the logged-in site owner */
  authenticateOwner?: (request: Request) => Promise<boolean>;
  renderConsent?: (consent: ConsentRequest, request: Request) => Promise<Response>;
}

export interface IndieWeb {
  config: ResolvedConfig;
  db: IndieHubDatabase;
  entries: EntryStore;
  tokens: TokenService;
  webmentions: WebMentionPipeline;
  websub: WebSubHub;
  trustedDomains: TrustedDomains;
  events: EntryEvents;
  tasks: BackgroundTasks;
  logger: Logger;
  authenticateOwner?: (request: Request) => Promise<boolean>;
  renderConsent?: (consent: ConsentRequest, request: Request) => Promise<Response>;
  /** Wait for background work, then close the database */
  close(): Promise<void>;
}

export interface RouteContext {
  request: Request;
  url: URL;
}

export type RouteHandler = (runtime: IndieWeb, context: RouteContext) => Promise<Response>;

const ENTRY_EVENT_TYPES: EntryEventType[] = [
  "entry:created",
  "entry:updated",
  "entry:deleted",
  "entry:undeleted",
];

/**
 * Whether an entry event changes what the public feeds show
 */
function affectsFeeds(event: EntryEvent): boolean {
  const isPublic = (entry: EntryEvent["entry"]) =>
    entry.location !== null && getVisibility(entry.content) !== "private";

  if (event.type === "entry:updated") {
    return isPublic(event.entry) || isPublic(event.previous);
  }
  return isPublic(event.entry);
}

/**
 * Build every service on one database and wire entry events to WebSub
 * publishing and outbound webmentions.
 */
export function createIndieWeb(
  options: IndieHubOptions,
  dependencies: IndieWebDependencies = {}
): IndieWeb {
  const config = validateConfig(options);
  const logger = dependencies.logger ?? createConsoleLogger();
  const now = dependencies.now ?? (() => new Date());
  const handle: DatabaseHandle = openDatabase(config.database.path);
  const { db } = handle;

  const tasks = new BackgroundTasks(logger);
  const events = new EntryEvents(tasks);
  const http = new HttpClient({
    fetch: dependencies.fetch,
    timeout: config.http.timeout,
    userAgent: config.http.userAgent,
  });

  const entries = new EntryStore(db, {
    me: config.site.me,
    postPath: config.micropub.postPath,
    now,
    events,
  });
  const trustedDomains = new TrustedDomains(db, now);
  const tokens = new TokenService(db, { config, http, now, logger });
  const webmentions = new WebMentionPipeline(db, {
    config,
    entries,
    trustedDomains,
    http,
    tasks,
    now,
    logger,
  });
  const websub = new WebSubHub(db, {
    config,
    http,
    now,
    logger,
    render: dependencies.renderTopic,
  });

  for (const type of ENTRY_EVENT_TYPES) {
    events.on(type, async (event) => {
      await webmentions.handleEntryEvent(event);
    });
    events.on(type, async (event) => {
      if (!affectsFeeds(event)) return;
      await websub.publishFeeds();
    });
  }

  logger.debug(`IndieWeb services ready for ${config.site.me}`);

  return {
    config,
    db,
    entries,
    tokens,
    webmentions,
    websub,
    trustedDomains,
    events,
    tasks,
    logger,
    authenticateOwner: dependencies.authenticateOwner,
    renderConsent: dependencies.renderConsent,
    async close() {
      await tasks.drain();
      handle.close();
    },
  };
}
