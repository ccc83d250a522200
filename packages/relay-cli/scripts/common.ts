import { config } from 'dotenv';
import { join } from 'path';

// .env from the working directory, then the repository root
config({ path: join(process.cwd(), '.env') });
config({ path: join(process.cwd(), '..', '..', '.env') });

export function formatDate(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}
