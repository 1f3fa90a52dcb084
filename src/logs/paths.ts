import os from 'os';
import path from 'path';

/**
 * Where the monitored client writes its logs on each platform. Linux
 * assumes the Sober flatpak.
 */
export function defaultAppLogDir(platform: NodeJS.Platform = process.platform): string {
  switch (platform) {
    case 'win32':
      return path.join(process.env.LOCALAPPDATA ?? path.join(os.homedir(), 'AppData', 'Local'), 'Roblox', 'logs');
    case 'darwin':
      return path.join(os.homedir(), 'Library', 'Logs', 'Roblox');
    default:
      return path.join(os.homedir(), '.var', 'app', 'org.vinegarhq.Sober', 'data', 'sober', 'sober_logs');
  }
}
