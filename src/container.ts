import type { RequestHandler } from 'express';
import type { AppConfig } from './config';
import { Database } from './config/database';
import { EmailController } from './controllers/email.controller';
import { HealthController } from './controllers/health.controller';
import { userContextMiddleware } from './middleware/user-context.middleware';
import { OAuthConnectionRepository, type ConnectionStore } from './repositories/oauth-connection.repository';
import { EmailSearchService } from './services/email/email-search.service';
import { MailboxService } from './services/email/mailbox.service';
import { FolderResolver } from './services/graph/folder-resolver.service';
import { GraphClient } from './services/graph/graph-client.service';
import { MicrosoftIdentityService, type IdentityProvider } from './services/oauth/microsoft-identity.service';
import { TokenManager } from './services/oauth/token-manager.service';
import { EncryptionUtil } from './utils/encryption.util';
import { RequestContext } from './utils/request-context';

export interface Container {
  config: AppConfig;
  database: Database;
  tokenManager: TokenManager;
  requestContext: RequestContext;
  graphClient: GraphClient;
  mailboxService: MailboxService;
  userContext: RequestHandler;
  emailController: EmailController;
  healthController: HealthController;
}

/**
 * Seams tests replace; everything else is built from config
 */
export interface ContainerOverrides {
  database?: Database;
  store?: ConnectionStore;
  identity?: IdentityProvider;
  graphClient?: GraphClient;
  requestContext?: RequestContext;
}

/**
 * Build every service once at startup and wire them explicitly
 */
export function createContainer(config: AppConfig, overrides: ContainerOverrides = {}): Container {
  const database = overrides.database ?? new Database(config.databaseUrl);
  const requestContext = overrides.requestContext ?? new RequestContext();

  const tokenManager = new TokenManager({
    store: overrides.store ?? new OAuthConnectionRepository(database),
    identity: overrides.identity ?? new MicrosoftIdentityService(config.microsoft),
    encryption: new EncryptionUtil(config.encryptionKey),
  });

  const graphClient = overrides.graphClient ?? new GraphClient(config.graph, requestContext);
  const mailboxService = new MailboxService(
    graphClient,
    new FolderResolver(graphClient),
    new EmailSearchService(graphClient, config.graph.emailListFields),
    config.graph
  );

  return {
    config,
    database,
    tokenManager,
    requestContext,
    graphClient,
    mailboxService,
    userContext: userContextMiddleware(tokenManager, requestContext),
    emailController: new EmailController(mailboxService),
    healthController: new HealthController(database),
  };
}
