import { z } from 'zod';

export const PROVISION_JOB = 'email-account.provision';
export const REMOTE_DELETE_JOB = 'email-account.remote-delete';

export const provisionJobSchema = z.object({
  accountId: z.string().min(1),
});

export const remoteDeleteJobSchema = z.object({
  emailAddress: z.string().min(1),
  provider: z.string().min(1),
});

export type ProvisionJob = z.infer<typeof provisionJobSchema>;
export type RemoteDeleteJob = z.infer<typeof remoteDeleteJobSchema>;

export type EmailAccountJobs = {
  [PROVISION_JOB]: ProvisionJob;
  [REMOTE_DELETE_JOB]: RemoteDeleteJob;
};

export const provisionTokenKey = (accountId: string): string => `email-account:provision-token:${accountId}`;
