/**
 * eaglet completions: shell completion scripts generated from the
 * registered command tree.
 *
 * Usage:
 *   eaglet completions bash > /etc/bash_completion.d/eaglet
 *   eaglet completions zsh > "${fpath[1]}/_eaglet"
 *   eaglet completions fish > ~/.config/fish/completions/eaglet.fish
 */

import { Argument, type Command, type Option } from 'commander';
import { UsageError } from '../errors.js';
import { defaultIO, runAction, type CliIO } from './context.js';

export const COMPLETION_SHELLS = ['bash', 'zsh', 'fish'] as const;

export type CompletionShell = (typeof COMPLETION_SHELLS)[number];

const HELP_WORD = '--help';

function optionWords(options: readonly Option[]): string[] {
  const words: string[] = [];
  for (const option of options) {
    if (option.short !== undefined) words.push(option.short);
    if (option.long !== undefined) words.push(option.long);
  }
  return words;
}

function takesValue(option: Option): boolean {
  return option.required || option.optional;
}

/** Every command below the program, with the program itself first. */
function allCommands(program: Command): Command[] {
  return [program, ...program.commands.flatMap((group) => [group, ...group.commands])];
}

/** Words accepted by a group that has no subcommands: its first argument's choices. */
function argumentChoices(command: Command): readonly string[] {
  return command.registeredArguments[0]?.argChoices ?? [];
}

function bashQuote(words: readonly string[]): string {
  return `"${words.join(' ')}"`;
}

function bashScript(program: Command): string {
  const name = program.name();
  const fn = `_${name.replace(/[^A-Za-z0-9_]/g, '_')}`;
  const globals = optionWords(program.options);

  const valueCases = new Map<string, string>();
  const valueFlags = new Set<string>();
  for (const command of allCommands(program)) {
    for (const option of command.options) {
      if (!takesValue(option)) continue;
      const flags = optionWords([option]);
      for (const flag of flags) valueFlags.add(flag);
      const choices = option.argChoices ?? [];
      valueCases.set(
        flags.join('|'),
        choices.length > 0 ? `COMPREPLY=($(compgen -W ${bashQuote(choices)} -- "$cur")); return ;;` : 'return ;;',
      );
    }
  }

  const wordCases: string[] = [
    `    ":") words=${bashQuote([...program.commands.map((group) => group.name()), ...globals, HELP_WORD])} ;;`,
  ];
  for (const group of program.commands) {
    const subcommands = group.commands.map((sub) => sub.name());
    const groupWords = subcommands.length > 0 ? subcommands : argumentChoices(group);
    wordCases.push(`    "${group.name()}:") words=${bashQuote([...groupWords, HELP_WORD])} ;;`);
    for (const sub of group.commands) {
      wordCases.push(
        `    "${group.name()}:${sub.name()}") words=${bashQuote([...optionWords(sub.options), ...globals, HELP_WORD])} ;;`,
      );
    }
  }

  return [
    `# bash completion for ${name}`,
    `${fn}() {`,
    '  local cur="${COMP_WORDS[COMP_CWORD]}"',
    '  local prev="${COMP_WORDS[COMP_CWORD-1]}"',
    '  case "$prev" in',
    ...[...valueCases].map(([pattern, action]) => `    ${pattern}) ${action}`),
    '  esac',
    '  local group="" sub="" word i',
    '  for ((i = 1; i < COMP_CWORD; i++)); do',
    '    word="${COMP_WORDS[i]}"',
    '    case "$word" in',
    `      ${[...valueFlags].join('|')}) ((i++)) ;;`,
    '      -*) ;;',
    '      *)',
    '        if [[ -z "$group" ]]; then group="$word"',
    '        elif [[ -z "$sub" ]]; then sub="$word"',
    '        fi',
    '        ;;',
    '    esac',
    '  done',
    '  local words=""',
    '  case "$group:$sub" in',
    ...wordCases,
    '  esac',
    '  COMPREPLY=($(compgen -W "$words" -- "$cur"))',
    '}',
    `complete -F ${fn} ${name}`,
    '',
  ].join('\n');
}

function zshScript(program: Command): string {
  return [`#compdef ${program.name()}`, 'autoload -U +X bashcompinit && bashcompinit', bashScript(program)].join('\n');
}

function fishQuote(text: string): string {
  return `'${text.replace(/[\\']/g, (c) => `\\${c}`)}'`;
}

function fishOptionLine(name: string, condition: string | null, option: Option): string {
  const parts = [`complete -c ${name}`];
  if (condition !== null) parts.push(`-n ${fishQuote(condition)}`);
  if (option.short !== undefined) parts.push(`-s ${option.short.replace(/^-/, '')}`);
  if (option.long !== undefined) parts.push(`-l ${option.long.replace(/^--/, '')}`);
  if (takesValue(option)) {
    parts.push('-r');
    const choices = option.argChoices ?? [];
    if (choices.length > 0) parts.push(`-a ${fishQuote(choices.join(' '))}`);
  }
  if (option.description !== '') parts.push(`-d ${fishQuote(option.description)}`);
  return parts.join(' ');
}

function fishScript(program: Command): string {
  const name = program.name();
  const lines = [`# fish completion for ${name}`, `complete -c ${name} -f`];

  for (const option of program.options) {
    lines.push(fishOptionLine(name, null, option));
  }
  lines.push(`complete -c ${name} -s h -l help -d ${fishQuote('Show help')}`);

  for (const group of program.commands) {
    lines.push(
      `complete -c ${name} -n ${fishQuote('__fish_use_subcommand')} -a ${fishQuote(group.name())} -d ${fishQuote(group.description())}`,
    );
    const inGroup = `__fish_seen_subcommand_from ${group.name()}`;
    const subcommands = group.commands.map((sub) => sub.name());

    if (subcommands.length === 0) {
      const choices = argumentChoices(group);
      if (choices.length > 0) {
        lines.push(`complete -c ${name} -n ${fishQuote(inGroup)} -a ${fishQuote(choices.join(' '))}`);
      }
      continue;
    }

    for (const sub of group.commands) {
      lines.push(
        `complete -c ${name} -n ${fishQuote(`${inGroup}; and not __fish_seen_subcommand_from ${subcommands.join(' ')}`)} -a ${fishQuote(sub.name())} -d ${fishQuote(sub.description())}`,
      );
      for (const option of sub.options) {
        lines.push(fishOptionLine(name, `${inGroup}; and __fish_seen_subcommand_from ${sub.name()}`, option));
      }
    }
  }

  return lines.join('\n') + '\n';
}

export function completionScript(program: Command, shell: CompletionShell): string {
  switch (shell) {
    case 'bash':
      return bashScript(program);
    case 'zsh':
      return zshScript(program);
    case 'fish':
      return fishScript(program);
  }
}

export function registerCompletionsCommand(program: Command, io: CliIO = defaultIO()): void {
  program
    .command('completions')
    .description('Print a shell completion script')
    .addArgument(new Argument('<shell>', 'Target shell').choices(COMPLETION_SHELLS))
    .action(async (shell: string, _opts: object, command: Command) => {
      await runAction(command, io, async () => {
        const target = COMPLETION_SHELLS.find((candidate) => candidate === shell);
        if (target === undefined) {
          throw new UsageError(`Unsupported shell '${shell}'`);
        }
        io.out.write(completionScript(program, target));
      });
    });
}
