/**
 * @file commands.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

// ============================================================================
// Command Variants
// ============================================================================

export interface NameCommand {
  kind: 'name';
  name: string;
}

export interface AddLanguageCommand {
  kind: 'add-lang';
  language: string;
}

export interface RemoveLanguageCommand {
  kind: 'remove-lang';
  language: string;
}

export interface BlockCommand {
  kind: 'block';
  username: string;
}

export interface UnblockCommand {
  kind: 'unblock';
  username: string;
}

export interface ListBlockedCommand {
  kind: 'blocked';
}

export interface ReportCommand {
  kind: 'report';
  username: string;
  reason: string;
}

export interface HelpCommand {
  kind: 'help';
}

/**
 * A known command keyword with missing arguments.
 */
export interface InvalidCommand {
  kind: 'invalid';
  keyword: CommandKeyword;
  usage: string;
}

/**
 * Anything that is not a command is chat text, kept verbatim.
 */
export interface ChatCommand {
  kind: 'chat';
  text: string;
}

export type Command =
  | NameCommand
  | AddLanguageCommand
  | RemoveLanguageCommand
  | BlockCommand
  | UnblockCommand
  | ListBlockedCommand
  | ReportCommand
  | HelpCommand
  | InvalidCommand
  | ChatCommand;

// ============================================================================
// Grammar
// ============================================================================

export const COMMAND_USAGE = {
  name: '/name <name>',
  'add-lang': '/add-lang <code-or-name>',
  'remove-lang': '/remove-lang <code-or-name>',
  block: '/block <name>',
  unblock: '/unblock <name>',
  blocked: '/blocked',
  report: '/report <name> <reason>',
  help: '/help',
} as const;

export type CommandKeyword = keyof typeof COMMAND_USAGE;

export const HELP_TEXT = `Commands: ${Object.values(COMMAND_USAGE).join(', ')}`;

function isCommandKeyword(value: string): value is CommandKeyword {
  return Object.prototype.hasOwnProperty.call(COMMAND_USAGE, value);
}

function invalid(keyword: CommandKeyword): InvalidCommand {
  return { kind: 'invalid', keyword, usage: COMMAND_USAGE[keyword] };
}

/**
 * Classifies one inbound line.
 *
 * The keyword is the first whitespace-separated token, matched case-insensitively.
 * Single-argument commands take the rest of the line, so names with spaces work;
 * /report takes one token as the target and the rest as the reason.
 */
export function parseCommand(line: string): Command {
  const trimmed = line.trim();
  const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(trimmed);
  const token = match?.[1];

  if (!token?.startsWith('/')) {
    return { kind: 'chat', text: line };
  }

  const keyword = token.slice(1).toLowerCase();
  if (!isCommandKeyword(keyword)) {
    return { kind: 'chat', text: line };
  }

  const rest = (match?.[2] ?? '').trim();

  switch (keyword) {
    case 'help':
      return { kind: 'help' };

    case 'blocked':
      return { kind: 'blocked' };

    case 'name':
      return rest ? { kind: 'name', name: rest } : invalid(keyword);

    case 'add-lang':
      return rest ? { kind: 'add-lang', language: rest } : invalid(keyword);

    case 'remove-lang':
      return rest ? { kind: 'remove-lang', language: rest } : invalid(keyword);

    case 'block':
      return rest ? { kind: 'block', username: rest } : invalid(keyword);

    case 'unblock':
      return rest ? { kind: 'unblock', username: rest } : invalid(keyword);

    case 'report': {
      const [username, ...reason] = rest.split(/\s+/);
      const reasonText = reason.join(' ');
      return username && reasonText
        ? { kind: 'report', username, reason: reasonText }
        : invalid(keyword);
    }
  }
}
