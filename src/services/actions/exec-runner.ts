import { spawn } from 'node:child_process';
import type { ExecActionSpec } from '../../types/config.js';
import { ActionFailedError } from '../../utils/errors.js';
import { logSystemCommand, scrubSensitiveText } from '../../utils/logger.js';
import { expandTemplate } from '../../utils/template.js';
import type { ActionContext, ActionRunner } from './types.js';

/**
 * Split a command into program and arguments on whitespace. Quotes and
 * escapes are not interpreted; a templated path containing spaces becomes
 * several arguments.
 */
export function tokenizeCommand(command: string): string[] {
    return command.trim().split(/\s+/).filter(Boolean);
}

export class ExecRunner implements ActionRunner<ExecActionSpec> {
    argv(context: ActionContext, action: ExecActionSpec): string[] {
        return tokenizeCommand(expandTemplate(action.command, context));
    }

    environment(context: ActionContext, action: ExecActionSpec): NodeJS.ProcessEnv {
        const env: NodeJS.ProcessEnv = { ...process.env };
        for (const [name, value] of Object.entries(action.env)) {
            env[name] = expandTemplate(value, context);
        }
        return env;
    }

    describe(context: ActionContext, action: ExecActionSpec): string {
        return `exec ${this.argv(context, action).join(' ')}`;
    }

    async run(context: ActionContext, action: ExecActionSpec, signal: AbortSignal): Promise<void> {
        const [program, ...args] = this.argv(context, action);
        if (!program) {
            throw new ActionFailedError('empty_command', `Command '${action.command}' expanded to nothing.`);
        }
        const preview = scrubSensitiveText([program, ...args].join(' '));

        const exitCode = await new Promise<number>((resolve, reject) => {
            const child = spawn(program, args, {
                cwd: action.cwd,
                env: this.environment(context, action),
                stdio: ['ignore', 'inherit', 'inherit'],
                signal,
                windowsHide: true,
            });
            child.once('error', (err) => {
                reject(new ActionFailedError('spawn_failed', `Failed to start '${program}': ${err.message}`, { cause: err }));
            });
            child.once('close', (code, killedBy) => {
                resolve(code ?? (killedBy ? 128 : 1));
            });
        });

        await logSystemCommand(preview, '', exitCode);
        if (exitCode !== 0) {
            throw new ActionFailedError('exit_code', `Command '${preview}' exited with code ${exitCode}.`);
        }
    }
}
