import { spawn } from 'node:child_process';
import makeDebug from './debug.js';
import { ensureOutputDir } from './utils.js';

const debug = makeDebug('reveal');

export interface OpenerCommand {
  readonly command: string;
  readonly args: readonly string[];
}

/**
 * Picks the file manager launcher for the platform.
 */
export const folderOpener = (folder: string, platform: NodeJS.Platform = process.platform): OpenerCommand => {
  if (platform === 'win32') {
    return { command: 'explorer', args: [folder] };
  }
  if (platform === 'darwin') {
    return { command: 'open', args: [folder] };
  }
  return { command: 'xdg-open', args: [folder] };
};

// Opens a folder in the OS file manager, creating it first when missing.
export const openFolder = async (folder: string): Promise<void> => {
  const trimmed = folder.trim();
  if (!trimmed) {
    throw new Error('Folder path is empty.');
  }
  const resolved = await ensureOutputDir(trimmed);
  const { command, args } = folderOpener(resolved);
  await new Promise<void>((resolve, reject) => {
    const child = spawn(command, [...args], { detached: true, stdio: 'ignore', shell: false });
    child.once('error', (error) => {
      debug('could not open %s with %s: %O', resolved, command, error);
      reject(error);
    });
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
};
