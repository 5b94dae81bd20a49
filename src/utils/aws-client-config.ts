/**
 * AWS Client Configuration Helper
 *
 * Builds the config object handed to the SES and CloudWatch clients.
 *
 * Supports:
 * - AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY (direct credentials)
 * - AWS_PROFILE (reads ~/.aws/credentials directly)
 * - otherwise the SDK default provider chain (Lambda execution role)
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

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
 * Read AWS credentials for a profile from ~/.aws/credentials
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

    if (trimmed === `[${profileName}]`) {
      inProfile = true;
      continue;
    }

    if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
      if (inProfile) break; // left our profile
      continue;
    }

    if (inProfile) {
      const value = trimmed.split('=')[1]?.trim();
      if (trimmed.startsWith('aws_access_key_id')) {
        accessKeyId = value;
      } else if (trimmed.startsWith('aws_secret_access_key')) {
        secretAccessKey = value;
      } else if (trimmed.startsWith('aws_session_token')) {
        sessionToken = value;
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
 * Get AWS client configuration with credentials from environment
 *
 * Priority:
 * 1. AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY
 * 2. AWS_PROFILE
 * 3. Default credential chain
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

  if (env.AWS_PROFILE) {
    const profileCredentials = readCredentialsFromProfile(env.AWS_PROFILE);
    if (profileCredentials) {
      config.credentials = profileCredentials;
    }
  }

  return config;
}
