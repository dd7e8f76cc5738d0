import { execa } from 'execa';
import { getErrorMessage } from '../utils/errors.js';

export interface OpenResult {
  ok: boolean;
  /** Exit code, or the spawn error message */
  detail: string;
}

export type UrlOpener = (url: string) => Promise<OpenResult>;

export function openerCommand(url: string, platform: NodeJS.Platform = process.platform): [string, string[]] {
  if (platform === 'darwin') return ['open', [url]];
  if (platform === 'win32') return ['cmd', ['/c', 'start', '""', url]];
  return ['xdg-open', [url]];
}

/** Open `url` with the platform's default handler. Never throws. */
export const openInBrowser: UrlOpener = async (url) => {
  const [command, args] = openerCommand(url);
  try {
    const result = await execa(command, args, { reject: false, stdio: 'ignore', timeout: 10_000 });
    return { ok: result.exitCode === 0, detail: `code ${String(result.exitCode)}` };
  } catch (error: unknown) {
    return { ok: false, detail: getErrorMessage(error) };
  }
};
