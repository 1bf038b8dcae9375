/**
 * Salesforce Session Establishment
 *
 * Builds the jsforce Connection every collaborator shares. Credentials come
 * either from an OAuth client-credentials grant against a connected app, or
 * from an org already authorised in the Salesforce CLI (@salesforce/core).
 */

import { Connection } from 'jsforce';
import fetch from 'node-fetch';
import { AuthInfo, Connection as CoreConnection } from '@salesforce/core';
import { z } from 'zod';
import type { AppConfig } from '../config/app-config.js';
import { ConfigurationError, SalesforceConnectionError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';

const log = createLogger('session');

export interface SessionCredentials {
  accessToken: string;
  instanceUrl: string;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  instance_url: z.string().url(),
});

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * OAuth 2.0 client-credentials grant against a connected app.
 */
export async function requestClientCredentialsToken(
  tokenUrl: string,
  consumerKey: string,
  consumerSecret: string
): Promise<SessionCredentials> {
  let body: unknown;
  try {
    const response = await fetch(tokenUrl, {
      method: 'POST',
      body: new URLSearchParams({
        grant_type: 'client_credentials',
        client_id: consumerKey,
        client_secret: consumerSecret,
      }),
    });
    body = await response.json();
    if (!response.ok) {
      throw new Error(`token endpoint returned ${response.status}: ${JSON.stringify(body)}`);
    }
  } catch (error) {
    throw new SalesforceConnectionError(
      `Token request failed: ${describeError(error)}`,
      undefined,
      error instanceof Error ? error : undefined
    );
  }

  const parsed = TokenResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new SalesforceConnectionError('Token response lacks access_token or instance_url');
  }
  return { accessToken: parsed.data.access_token, instanceUrl: parsed.data.instance_url };
}

/**
 * Resolves an alias or username to a username known to the CLI keychain.
 * Falls back to a search through every authorization.
 */
async function resolveUsername(aliasOrUsername: string): Promise<string> {
  try {
    const authInfo = await AuthInfo.create({ username: aliasOrUsername });
    return authInfo.getUsername();
  } catch (initialError) {
    const auths = await AuthInfo.listAllAuthorizations();
    const match = auths.find((a) => a.aliases?.includes(aliasOrUsername));
    if (match?.username) {
      log.debug({ alias: aliasOrUsername, username: match.username }, 'Resolved org alias');
      return match.username;
    }
    throw initialError;
  }
}

/**
 * Access token and instance URL of an org authorised in the Salesforce CLI.
 */
export async function getOrgCredentials(aliasOrUsername: string): Promise<SessionCredentials> {
  try {
    const username = await resolveUsername(aliasOrUsername);
    const authInfo = await AuthInfo.create({ username });
    const connection = await CoreConnection.create({ authInfo });
    if (!connection.accessToken) {
      throw new Error('no access token stored for this org');
    }
    return { accessToken: connection.accessToken, instanceUrl: connection.instanceUrl };
  } catch (error) {
    throw new SalesforceConnectionError(
      `Failed to create connection for "${aliasOrUsername}": ${describeError(error)}`,
      aliasOrUsername,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Open a jsforce connection with the configured credentials. Client
 * credentials win over a CLI org when both are configured.
 *
 * @throws ConfigurationError when neither strategy is configured
 * @throws SalesforceConnectionError when authentication fails
 */
export async function establishSession(config: AppConfig): Promise<Connection> {
  let credentials: SessionCredentials;

  if (config.tokenUrl && config.consumerKey && config.consumerSecret) {
    credentials = await requestClientCredentialsToken(config.tokenUrl, config.consumerKey, config.consumerSecret);
  } else if (config.targetOrg) {
    credentials = await getOrgCredentials(config.targetOrg);
  } else {
    throw new ConfigurationError(
      'No Salesforce credentials configured. Either:\n' +
        '1. Set SALESFORCE_TOKEN_URL, CONSUMER_KEY and CONSUMER_SECRET, or\n' +
        '2. Set SF_TARGET_ORG to an org authorised with: sf org login web --alias my-org',
      'targetOrg'
    );
  }

  log.info({ instanceUrl: credentials.instanceUrl }, 'Connected to Salesforce');
  return new Connection({
    accessToken: credentials.accessToken,
    instanceUrl: credentials.instanceUrl,
    version: config.apiVersion,
  });
}
