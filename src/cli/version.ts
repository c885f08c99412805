import { readFileSync } from 'fs';
import { z } from 'zod';

const PackageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
});

export type PackageInfo = z.infer<typeof PackageInfoSchema>;

// src/cli and dist/cli both sit two levels below the package root
const packageJsonUrl = new URL('../../package.json', import.meta.url);

export const PACKAGE_INFO: PackageInfo = PackageInfoSchema.parse(
  JSON.parse(readFileSync(packageJsonUrl, 'utf-8'))
);
