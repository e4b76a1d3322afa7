import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { getAWSClientConfig, readCredentialsFromProfile } from '../../../utils/aws-client-config';

describe('aws-client-config', () => {
  let tmpDir: string;
  let credentialsPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'aws-client-config-'));
    credentialsPath = path.join(tmpDir, 'credentials');
    fs.writeFileSync(credentialsPath, [
      '[default]',
      'aws_access_key_id = default-key',
      'aws_secret_access_key = default-secret',
      '',
      '[reporting]',
      'aws_access_key_id=reporting-key',
      'aws_secret_access_key=test-secret==',
      'aws_session_token=test-token',
      '',
      '[partial]',
      'aws_access_key_id=partial-key',
    ].join('\n'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('readCredentialsFromProfile', () => {
    it('should read the named profile', () => {
      expect(readCredentialsFromProfile('reporting', credentialsPath)).toEqual({
        accessKeyId: 'reporting-key',
        secretAccessKey: 'test-secret==',
        sessionToken: 'test-token',
      });
    });

    it('should stop at the next profile header', () => {
      expect(readCredentialsFromProfile('default', credentialsPath)).toEqual({
        accessKeyId: 'default-key',
        secretAccessKey: 'default-secret',
      });
    });

    it('should return null for incomplete or missing profiles', () => {
      expect(readCredentialsFromProfile('partial', credentialsPath)).toBeNull();
      expect(readCredentialsFromProfile('missing', credentialsPath)).toBeNull();
      expect(readCredentialsFromProfile('default', path.join(tmpDir, 'absent'))).toBeNull();
    });
  });

  describe('getAWSClientConfig', () => {
    it('should prefer credentials from the environment', () => {
      expect(getAWSClientConfig('eu-west-1', {
        AWS_ACCESS_KEY_ID: 'test-key',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
      })).toEqual({
        region: 'eu-west-1',
        credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
      });
    });

    it('should fall back to AWS_REGION', () => {
      expect(getAWSClientConfig(undefined, {
        AWS_REGION: 'us-east-1',
        AWS_ACCESS_KEY_ID: 'test-key',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
        AWS_SESSION_TOKEN: 'test-token',
      })).toEqual({
        region: 'us-east-1',
        credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret', sessionToken: 'test-token' },
      });
    });
  });
});
