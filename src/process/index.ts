export { SpawnRunner, describeCommand, type ProcessRunner, type RunOptions } from './runner.js';
export { launchCommand, type LaunchCommand } from './launcher.js';
export { DEFAULT_VIEWER, imageViewerArgs, animationStillArgs, animationPlayArgs } from './viewer.js';
