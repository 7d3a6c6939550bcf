import ora from 'ora';
import chalk from 'chalk';

export interface SpinnerOutcome {
    ok: boolean;
    text: string;
}

/**
 * Run a task behind a spinner, then stop it with a success or failure mark
 * derived from the task's result. A thrown error stops the spinner as a
 * failure and is rethrown.
 */
export function withSpinner<T>(message: string, task: () => T, outcome: (result: T) => SpinnerOutcome): T {
    const spinner = ora({ color: 'cyan', spinner: 'dots' }).start(chalk.dim(message));

    let result: T;
    try {
        result = task();
    } catch (err) {
        spinner.fail(chalk.red(message));
        throw err;
    }

    const { ok, text } = outcome(result);
    if (ok) {
        spinner.succeed(chalk.green(text));
    } else {
        spinner.fail(chalk.red(text));
    }
    return result;
}
