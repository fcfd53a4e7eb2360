/**
 * Entry point of a profile worker process
 *
 * Receives ProfileTask messages over IPC and answers each with a
 * ProfileTaskResult. Exits once the parent closes the channel.
 */

import { runProfileTask } from './profile-task.js';

process.on('message', (message: unknown) => {
  process.send?.(runProfileTask(message));
});
