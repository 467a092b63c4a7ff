import chalk from 'chalk';
import type { Message } from '../message/message';
import { log } from './logger';

function formatLabel(message: Message): string {
  switch (message.format) {
    case 'JSON':
      return chalk.cyan('JSON');
    case 'XML':
      return chalk.magenta('XML');
  }
}

export function printMessage(message: Message) {
  const size = message.byteLength === 1 ? '1 byte' : `${message.byteLength} bytes`;
  log(`${chalk.bold(formatLabel(message))} ${chalk.dim(`(${size})`)}`);
  log(`  ${message.toString()}`);
  log('');
}

// Bare body, one per line; bypasses the logger so silent mode keeps it
export function printRawMessage(message: Message) {
  process.stdout.write(`${message.toString()}\n`);
}

export function printBuildSummary(count: number) {
  const msgTxt = count === 1 ? '1 message' : `${count} messages`;
  log(`${chalk.green('✓')} Built ${msgTxt}.`);
}
