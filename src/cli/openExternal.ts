import { spawn } from 'child_process';
import { parsePortalUrl } from '../security/urlValidation.js';

async function spawnDetached(command: string, args: string[]): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const child = spawn(command, args, {
      detached: true,
      stdio: 'ignore',
      windowsHide: true,
    });

    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}

/**
 * Open an application portal in the user's default browser.
 * Returns the URL that was actually opened.
 */
export async function openPortalUrl(rawUrl: string): Promise<string> {
  const url = parsePortalUrl(rawUrl).toString();

  if (process.platform === 'win32') {
    await spawnDetached('rundll32.exe', ['url.dll,FileProtocolHandler', url]);
  } else if (process.platform === 'darwin') {
    await spawnDetached('open', [url]);
  } else {
    await spawnDetached('xdg-open', [url]);
  }

  return url;
}
