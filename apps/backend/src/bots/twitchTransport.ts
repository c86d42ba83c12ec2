import tmi from 'tmi.js';
import type { Client } from 'tmi.js';
import { AppError, ERROR_CODES } from '../shared/errors.js';
import { getErrorMessage } from '../utils/logger.js';
import type { ChatTransport } from './moderationExecutor.js';

export type TmiClientConfig = {
  botLogin: string;
  oauthToken: string;
  channels: string[];
};

export function createTmiClient(config: TmiClientConfig): Client {
  const token = config.oauthToken.startsWith('oauth:') ? config.oauthToken : `oauth:${config.oauthToken}`;
  return tmi.client({
    options: { debug: false },
    connection: { secure: true, reconnect: true },
    identity: { username: config.botLogin, password: token },
    channels: config.channels,
  });
}

async function run(action: string, channelLogin: string, fn: () => Promise<unknown>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    throw new AppError({
      errorCode: ERROR_CODES.TRANSPORT_FAILED,
      message: `${action} failed: ${getErrorMessage(err)}`,
      details: { action, channelLogin },
    });
  }
}

export function createTmiTransport(client: Client): ChatTransport {
  return {
    say: (channelLogin, message) => run('say', channelLogin, () => client.say(channelLogin, message)),
    deleteMessage: (channelLogin, messageId) => run('delete', channelLogin, () => client.deletemessage(channelLogin, messageId)),
    timeout: (channelLogin, userLogin, seconds, reason) =>
      run('timeout', channelLogin, () => client.timeout(channelLogin, userLogin, seconds, reason)),
    ban: (channelLogin, userLogin, reason) => run('ban', channelLogin, () => client.ban(channelLogin, userLogin, reason)),
  };
}
