import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { getAWSClientConfig, readCredentialsFromProfile } from '../../../utils/aws-client-config';

describe('aws-client-config', () => {
  let tmpDir: string;
  let credentialsPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ses-monitor-'));
    credentialsPath = path.join(tmpDir, 'credentials');
    fs.writeFileSync(
      credentialsPath,
      [
        '[default]',
        'aws_access_key_id = default-key',
        'aws_secret_access_key = default-secret',
        '',
        '[monitor]',
        'aws_access_key_id = monitor-key',
        'aws_secret_access_key = monitor-secret',
        'aws_session_token = monitor-token',
        '[other]',
        'aws_access_key_id = other-key',
      ].join('\n')
    );
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('readCredentialsFromProfile', () => {
    it('should read the named profile only', () => {
      expect(readCredentialsFromProfile('monitor', credentialsPath)).toEqual({
        accessKeyId: 'monitor-key',
        secretAccessKey: 'monitor-secret',
        sessionToken: 'monitor-token',
      });
      expect(readCredentialsFromProfile('default', credentialsPath)).toEqual({
        accessKeyId: 'default-key',
        secretAccessKey: 'default-secret',
      });
    });

    it('should return null for incomplete or unknown profiles', () => {
      expect(readCredentialsFromProfile('other', credentialsPath)).toBeNull();
      expect(readCredentialsFromProfile('missing', credentialsPath)).toBeNull();
      expect(readCredentialsFromProfile('monitor', path.join(tmpDir, 'nope'))).toBeNull();
    });
  });

  describe('getAWSClientConfig', () => {
    it('should prefer static credentials from the environment', () => {
      const config = getAWSClientConfig('eu-west-1', {
        AWS_ACCESS_KEY_ID: 'test-key',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
        AWS_PROFILE: 'monitor',
      });

      expect(config).toEqual({
        region: 'eu-west-1',
        credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
      });
    });

    it('should fall back to AWS_REGION and the default chain', () => {
      expect(getAWSClientConfig(undefined, { AWS_REGION: 'us-west-2' })).toEqual({ region: 'us-west-2' });
    });
  });
});
