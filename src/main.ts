import * as core from '@actions/core';
import { run } from './index';

run().catch((error: unknown) => {
  if (error instanceof Error) {
    core.setFailed(error.message);
  } else {
    core.setFailed('Unknown error occurred.');
  }
});
