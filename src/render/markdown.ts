/**
 * Terminal display for Markdown replies.
 * Line-based styling only: headings, bullets, fenced blocks, inline code.
 */

import chalk from 'chalk';

function styleInline(line: string): string {
  return line
    .replace(/`([^`]+)`/g, (_m, code: string) => chalk.yellow(code))
    .replace(/\*\*([^*]+)\*\*/g, (_m, bold: string) => chalk.bold(bold));
}

export function formatMarkdown(markdown: string): string {
  const out: string[] = [];
  let inFence = false;

  for (const line of markdown.split('\n')) {
    if (line.trimStart().startsWith('```')) {
      inFence = !inFence;
      out.push(chalk.gray(line));
      continue;
    }

    if (inFence) {
      out.push(chalk.green(line));
      continue;
    }

    const heading = /^(#{1,6})\s+(.*)$/.exec(line);
    if (heading) {
      const text = heading[2];
      out.push(heading[1].length <= 2 ? chalk.bold.cyan(text) : chalk.bold(text));
      continue;
    }

    const bullet = /^(\s*)[-*]\s+(.*)$/.exec(line);
    if (bullet) {
      out.push(`${bullet[1]}${chalk.cyan('•')} ${styleInline(bullet[2])}`);
      continue;
    }

    out.push(styleInline(line));
  }

  return out.join('\n');
}

export function renderMarkdown(markdown: string): void {
  console.log(formatMarkdown(markdown));
}
