/**
 * AWS Client Configuration Helper
 *
 * Builds DynamoDB client configuration with static credentials when they are
 * available, so the SDK does not fall back to its dynamic provider chain.
 *
 * Supports:
 * - AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY (direct credentials)
 * - AWS_PROFILE (reads ~/.aws/credentials)
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';

export interface AWSCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

export interface AWSClientConfig {
  region?: string;
  credentials?: AWSCredentials;
}

/**
 * Read one profile's credentials from a credentials file. Null when the file
 * or the profile is missing.
 */
export function readCredentialsFromProfile(
  profileName: string,
  credentialsPath: string = path.join(os.homedir(), '.aws', 'credentials')
): AWSCredentials | null {
  if (!fs.existsSync(credentialsPath)) {
    return null;
  }

  const lines = fs.readFileSync(credentialsPath, 'utf-8').split('\n');
  let inProfile = false;
  let accessKeyId: string | undefined;
  let secretAccessKey: string | undefined;
  let sessionToken: string | undefined;

  for (const line of lines) {
    const trimmed = line.trim();

    if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
      if (inProfile) break; // left our profile
      inProfile = trimmed === `[${profileName}]`;
      continue;
    }

    if (inProfile) {
      const [key, ...rest] = trimmed.split('=');
      const value = rest.join('=').trim();
      switch (key.trim()) {
        case 'aws_access_key_id':
          accessKeyId = value;
          break;
        case 'aws_secret_access_key':
          secretAccessKey = value;
          break;
        case 'aws_session_token':
          sessionToken = value;
          break;
      }
    }
  }

  if (accessKeyId && secretAccessKey) {
    return {
      accessKeyId,
      secretAccessKey,
      ...(sessionToken ? { sessionToken } : {}),
    };
  }
  return null;
}

/**
 * Priority:
 * 1. AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY
 * 2. AWS_PROFILE
 * 3. default profile
 * 4. SDK default provider chain (no credentials set here)
 */
export function getAWSClientConfig(region?: string, env: NodeJS.ProcessEnv = process.env): AWSClientConfig {
  const config: AWSClientConfig = { region: region || env.AWS_REGION };

  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
      ...(env.AWS_SESSION_TOKEN ? { sessionToken: env.AWS_SESSION_TOKEN } : {}),
    };
    return config;
  }

  const profileCredentials =
    (env.AWS_PROFILE ? readCredentialsFromProfile(env.AWS_PROFILE) : null)
    ?? readCredentialsFromProfile('default');
  if (profileCredentials) {
    config.credentials = profileCredentials;
  }
  return config;
}

/** Document client for the payments table. */
export function createDocumentClient(region: string): DynamoDBDocumentClient {
  return DynamoDBDocumentClient.from(new DynamoDBClient(getAWSClientConfig(region)), {
    marshallOptions: { removeUndefinedValues: true },
  });
}
