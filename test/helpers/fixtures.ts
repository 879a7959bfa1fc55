import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

const FIXTURES = new URL('../fixtures/', import.meta.url);

export function loadFixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(name, FIXTURES)), 'utf8');
}

export function loadJsonFixture(name: string): unknown {
  const data: unknown = JSON.parse(loadFixture(name));
  return data;
}

export const fixedClock = (iso: string) => (): Date => new Date(iso);
