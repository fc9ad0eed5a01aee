import { JobRegistry } from '../registry.js';
import { sendVerificationEmailJob } from './send_verification_email.js';
import type { SendVerificationEmailDeps } from './send_verification_email.js';

export type JobDependencies = SendVerificationEmailDeps;

// Every job type the worker can run. Registration fails fast on duplicates.
export function createJobRegistry(deps: JobDependencies): JobRegistry {
  return new JobRegistry().register(sendVerificationEmailJob(deps));
}

export * from './send_verification_email.js';
