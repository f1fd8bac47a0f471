/**
 * Shell completion scripts generated from the commander program, so they
 * always match the registered commands and options.
 */

import { Argument, Command } from 'commander';

export const SHELLS = ['bash', 'zsh', 'fish'] as const;
export type Shell = (typeof SHELLS)[number];

function flagsOf(cmd: Command): string[] {
  const flags: string[] = [];
  for (const opt of cmd.options) {
    if (opt.short) flags.push(opt.short);
    if (opt.long) flags.push(opt.long);
  }
  return flags;
}

function quote(s: string): string {
  return s.replace(/'/g, `'\\''`);
}

function bashScript(program: Command): string {
  const name = program.name();
  const commands = program.commands.map(c => c.name());
  const globals = [...flagsOf(program), '--help'];
  const cases = program.commands
    .map(c => `    ${c.name()}) COMPREPLY=( $(compgen -W "${[...flagsOf(c), '--help'].join(' ')}" -- "$cur") ) ;;`)
    .join('\n');

  return [
    `_${name}_completions() {`,
    '  local cur="${COMP_WORDS[COMP_CWORD]}"',
    '  if [[ $COMP_CWORD -eq 1 ]]; then',
    `    COMPREPLY=( $(compgen -W "${[...commands, ...globals].join(' ')}" -- "$cur") )`,
    '    return',
    '  fi',
    '  case "${COMP_WORDS[1]}" in',
    cases,
    '  esac',
    '}',
    `complete -F _${name}_completions ${name}`,
    '',
  ].join('\n');
}

function zshScript(program: Command): string {
  const name = program.name();
  const described = program.commands
    .map(c => `    '${quote(c.name())}:${quote(c.description())}'`)
    .join('\n');
  const cases = program.commands
    .map(c => `    ${c.name()}) compadd -- ${[...flagsOf(c), '--help'].join(' ')} ;;`)
    .join('\n');

  return [
    `#compdef ${name}`,
    '',
    `_${name}() {`,
    '  local -a commands',
    '  commands=(',
    described,
    '  )',
    '  if (( CURRENT == 2 )); then',
    "    _describe 'command' commands",
    '    return',
    '  fi',
    '  case "$words[2]" in',
    cases,
    '  esac',
    '}',
    '',
    `compdef _${name} ${name}`,
    '',
  ].join('\n');
}

function fishScript(program: Command): string {
  const name = program.name();
  const lines: string[] = [];

  for (const c of program.commands) {
    lines.push(`complete -c ${name} -f -n '__fish_use_subcommand' -a ${c.name()} -d '${quote(c.description())}'`);
  }
  for (const c of program.commands) {
    for (const opt of c.options) {
      let line = `complete -c ${name} -n '__fish_seen_subcommand_from ${c.name()}'`;
      if (opt.short) line += ` -s ${opt.short.replace(/^-/, '')}`;
      if (opt.long) line += ` -l ${opt.long.replace(/^--/, '')}`;
      if (opt.required) line += ' -r';
      lines.push(`${line} -d '${quote(opt.description)}'`);
    }
  }
  lines.push('');
  return lines.join('\n');
}

export function generateCompletion(program: Command, shell: Shell): string {
  switch (shell) {
    case 'bash': return bashScript(program);
    case 'zsh': return zshScript(program);
    case 'fish': return fishScript(program);
  }
}

export function createCompletionsCommand(): Command {
  return new Command('completions')
    .description('Print a shell completion script')
    .addArgument(new Argument('<shell>', 'Shell to generate completions for').choices(SHELLS))
    .action((shell: Shell, _opts: unknown, cmd: Command) => {
      const program = cmd.parent ?? cmd;
      process.stdout.write(generateCompletion(program, shell));
    });
}
