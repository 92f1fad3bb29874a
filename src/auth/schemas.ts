import { promises as fsp } from 'fs';
import { z } from 'zod';

/** `credentials.json` as downloaded for an installed-app OAuth client. */
export const InstalledCredentialsSchema = z.object({
  installed: z.object({
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
    project_id: z.string().optional(),
    auth_uri: z.string().optional(),
    token_uri: z.string().optional(),
    redirect_uris: z.array(z.string()).optional(),
  }),
});

export const StoredTokenSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  id_token: z.string().nullish(),
  scope: z.string().optional(),
});

export type InstalledCredentials = z.infer<typeof InstalledCredentialsSchema>;
export type StoredToken = z.infer<typeof StoredTokenSchema>;

export async function readJsonFile<S extends z.ZodTypeAny>(filename: string, schema: S): Promise<z.infer<S>> {
  const raw = await fsp.readFile(filename, 'utf8');
  return schema.parse(JSON.parse(raw));
}

export async function writeJsonFile(filename: string, data: unknown) {
  await fsp.writeFile(filename, JSON.stringify(data), { mode: 0o600 });
}
