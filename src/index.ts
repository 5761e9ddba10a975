#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig, getGoogleSettings } from './config/digest';
import { createDigestService } from './services/digest/DigestService';
import { startDigestScheduler } from './services/digest/DigestScheduler';
import { OAuthManager, TokenStore, readOAuthConfig } from './services/auth';
import { scoredBlocksToJson } from './models/transformers';

export type CliCommand =
  | { name: 'run'; dryRun: boolean }
  | { name: 'schedule' }
  | { name: 'auth-url' }
  | { name: 'auth-code'; code: string };

export const USAGE = `Usage: newsletter-digest <command>

Commands:
  run [--dry-run]    Build and send one digest (--dry-run prints kept blocks instead)
  schedule           Send digests on the "schedule" cron expression from config.yaml
  auth-url           Print the Google consent URL
  auth-code <code>   Exchange the consent code and save token.json`;

export function parseCommand(argv: string[]): CliCommand {
  const [name = 'run', ...rest] = argv;

  switch (name) {
    case 'run':
      return { name: 'run', dryRun: rest.includes('--dry-run') };
    case 'schedule':
      return { name: 'schedule' };
    case 'auth-url':
      return { name: 'auth-url' };
    case 'auth-code': {
      const code = rest[0]?.trim();
      if (!code) {
        throw new Error('auth-code needs the authorization code from the consent redirect');
      }
      return { name: 'auth-code', code };
    }
    default:
      throw new Error(`Unknown command "${name}"\n\n${USAGE}`);
  }
}

async function main(argv: string[]): Promise<void> {
  // Load environment variables
  dotenv.config();

  const command = parseCommand(argv);

  switch (command.name) {
    case 'run': {
      const config = loadConfig();
      const digest = await createDigestService(config);
      const report = await digest.run({ dryRun: command.dryRun });
      if (command.dryRun) {
        console.log(scoredBlocksToJson(report.kept));
      }
      console.log(
        `📊 ${report.messagesProcessed}/${report.messagesListed} messages processed, ` +
          `${report.messagesSkipped} skipped, ${report.messagesFailed} failed, ` +
          `${report.blocksKept}/${report.blocksProduced} blocks kept`
      );
      return;
    }

    case 'schedule': {
      const config = loadConfig();
      if (!config.schedule) {
        throw new Error('No "schedule" cron expression in the configuration');
      }
      startDigestScheduler(config.schedule, async () => {
        // Fresh clients per run, so a model or token change is picked up next tick
        const digest = await createDigestService(loadConfig());
        return digest.run();
      });
      return;
    }

    case 'auth-url': {
      const oauthManager = new OAuthManager(await readOAuthConfig(getGoogleSettings().credentialsPath));
      console.log('Open this URL, approve access, then run "auth-code <code>" with the code from the redirect:');
      console.log(oauthManager.getAuthorizationUrl());
      return;
    }

    case 'auth-code': {
      const settings = getGoogleSettings();
      const oauthManager = new OAuthManager(await readOAuthConfig(settings.credentialsPath));
      const tokens = await oauthManager.exchangeCodeForTokens(command.code);
      await new TokenStore(settings.tokenPath).storeTokens(tokens);
      console.log(`✅ Gmail tokens saved to ${settings.tokenPath}`);
      return;
    }
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).catch(error => {
    console.error('❌ newsletter-digest failed:', error);
    process.exit(1);
  });
}

export { main };
