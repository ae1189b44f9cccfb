/**
 * Registry client types
 */

import type { HttpClient } from '../api/http.js';
import type { ApiLogger } from '../api/logger.js';

/** Upper bound on pages followed for a single tag listing */
export const MAX_PAGES = 200;

export interface DockerHubCredentials {
  username: string;
  token: string;
}

export interface RegistryCredentials {
  dockerHub?: DockerHubCredentials;
  /** GitHub token for ghcr.io */
  githubToken?: string;
}

/**
 * Shared collaborators of the tag listing functions
 */
export interface RegistryContext {
  http: HttpClient;
  logger: ApiLogger;
  credentials: RegistryCredentials;
}

/**
 * Lists every tag of a repository; throws on failure.
 */
export type TagLister = (ctx: RegistryContext, repository: string) => Promise<string[]>;

/**
 * Read registry credentials from the environment.
 */
export function credentialsFromEnv(env: NodeJS.ProcessEnv = process.env): RegistryCredentials {
  const credentials: RegistryCredentials = {};

  const username = env.DOCKERHUB_USERNAME?.trim();
  const token = env.DOCKERHUB_TOKEN?.trim() || env.DOCKERHUB_PASSWORD?.trim();
  if (username && token) {
    credentials.dockerHub = { username, token };
  }

  const githubToken = env.GITHUB_TOKEN?.trim() || env.GH_TOKEN?.trim();
  if (githubToken) {
    credentials.githubToken = githubToken;
  }

  return credentials;
}
