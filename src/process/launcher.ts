/**
 * OS default-application launcher.
 */

export interface LaunchCommand {
  command: string;
  args: string[];
}

/**
 * The command that opens `path` with the platform's registered application
 * and waits for it where the platform allows.
 */
export function launchCommand(path: string, platform: NodeJS.Platform = process.platform): LaunchCommand {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: ['-W', '-F', '-n', path] };
    case 'win32':
      // The empty argument is start's window title; spawn quotes it as "".
      return { command: 'cmd', args: ['/c', 'start', '', '/wait', path] };
    default:
      return { command: 'xdg-open', args: [path] };
  }
}
