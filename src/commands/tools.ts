/**
 * Tools command — prints the advertised tool table as JSON.
 */

import { listTools } from '../calculator/tools.js';

export function renderToolTable(): string {
  return JSON.stringify({ tools: listTools() }, null, 2);
}

export function printTools(): void {
  console.log(renderToolTable());
}
