import { describe, expect, it } from 'vitest';

import { createStatusReporter } from './statusReporter';
import { createRecordingLogger } from './testHelpers';
import { countTokenLines, verifyConfigFile } from './verifyConfigFile';

const verify = async (content: string) => {
  const { logger, info } = createRecordingLogger();
  const count = await verifyConfigFile({
    filePath: '/cfg/ansible.cfg',
    placeholder: '{{Hub_token}}',
    tokenLinePrefix: 'token=',
    fs: { readFile: async () => content },
    reporter: createStatusReporter({ logger, color: false }),
  });
  return { count, info };
};

describe('countTokenLines', () => {
  it('counts only lines starting with the prefix', () => {
    expect(
      countTokenLines('token=a\n  token=b\n# token=c\ntoken=d\r\n', 'token='),
    ).toBe(2);
  });
});

describe('verifyConfigFile', () => {
  it('reports the number of token lines', async () => {
    const { count, info } = await verify(
      '[galaxy_server.hub]\ntoken=abc123\n',
    );
    expect(count).toBe(1);
    expect(info).toEqual([
      '🔍 Verifying configuration update...',
      '✅ Configuration verification successful',
      '📊 Found 1 token configurations in ansible.cfg',
    ]);
  });

  it('fails when the placeholder is still present', async () => {
    await expect(verify('token={{Hub_token}}\n')).rejects.toMatchObject({
      kind: 'verification-failed',
      message: 'Token placeholder still found in configuration file',
    });
  });

  it('fails when there are no token lines', async () => {
    await expect(verify('[defaults]\nhost_key_checking=False\n')).rejects
      .toMatchObject({
        kind: 'verification-failed',
        message: 'No token configurations found in ansible.cfg',
      });
  });

  it('fails when the file cannot be read', async () => {
    const { logger } = createRecordingLogger();
    await expect(
      verifyConfigFile({
        filePath: '/cfg/ansible.cfg',
        placeholder: '{{Hub_token}}',
        tokenLinePrefix: 'token=',
        fs: {
          readFile: async () => {
            throw new Error('EACCES');
          },
        },
        reporter: createStatusReporter({ logger, color: false }),
      }),
    ).rejects.toMatchObject({
      kind: 'verification-failed',
      message: 'Failed to read configuration file for verification',
      details: ['Reason: EACCES'],
    });
  });
});
