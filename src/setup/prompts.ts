import * as p from '@clack/prompts';
import pc from 'picocolors';
import { DEFAULT_SERVER_URL } from '../services/environmentService.js';

export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

function validateEmail(value: string): string | undefined {
  if (!value) return 'Email is required';
  if (!/^[^@\s]+@[^@\s]+\.[^@\s]+$/.test(value)) return 'Invalid email address';
  return undefined;
}

function validateUrl(value: string): string | undefined {
  if (!value) return undefined;
  try {
    new URL(value);
    return undefined;
  } catch {
    return 'Invalid URL';
  }
}

export interface InitAnswers {
  email: string;
  serverUrl: string;
}

/**
 * Asks for whatever `init` was not given on the command line.
 * Returns undefined when the user cancels.
 */
export async function promptInitAnswers(root: string, given: Partial<InitAnswers>): Promise<InitAnswers | undefined> {
  p.intro(pc.bgCyan(pc.black(' boxenv init ')));
  p.note(`Environment root: ${pc.cyan(root)}`, 'New environment');

  let email = given.email;
  if (!email) {
    const answer = await p.text({
      message: 'Email for this environment:',
      placeholder: 'e.g., alice@example.com',
      validate: validateEmail,
    });
    if (p.isCancel(answer)) {
      p.cancel('Init cancelled.');
      return undefined;
    }
    email = answer;
  }

  let serverUrl = given.serverUrl;
  if (!serverUrl) {
    const answer = await p.text({
      message: 'Server URL:',
      placeholder: DEFAULT_SERVER_URL,
      defaultValue: DEFAULT_SERVER_URL,
      validate: validateUrl,
    });
    if (p.isCancel(answer)) {
      p.cancel('Init cancelled.');
      return undefined;
    }
    serverUrl = answer;
  }

  p.outro(pc.green('Creating environment...'));
  return { email, serverUrl };
}

export async function confirmRemoval(root: string, purge: boolean): Promise<boolean> {
  const confirmed = await p.confirm({
    message: purge
      ? `Remove ${root} from the registry and delete its .boxenv directory?`
      : `Remove ${root} from the registry?`,
    initialValue: false,
  });
  return !p.isCancel(confirmed) && confirmed;
}
