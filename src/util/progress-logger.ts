import chalk from 'chalk';
import termSize from 'term-size';

const { stdout, platform } = process;

/**
 * One `[ 42.00%] item` line, redrawn in place on every tick and marked with a check once all
 * `total` steps are done. Draws nothing when stdout is not a terminal.
 */
export class ProgressLogger {
	private counter = 0;
	private columns = 0;
	private readonly onResize = () => this.resize();

	constructor(
		private readonly total: number,
		item: string,
	) {
		if (!stdout.isTTY) return;

		this.resize();
		stdout.on('resize', this.onResize);

		stdout.write(`${chalk.cyan('-')} [  0.00%] ${item.slice(0, Math.max(0, this.columns - 13))}\n`);
		if (this.total === 0) this.finish();
	}

	tick() {
		this.counter++;
		if (!stdout.isTTY || this.counter > this.total) return;

		stdout.moveCursor(0, -1);
		stdout.cursorTo(3);
		stdout.write(((this.counter / this.total) * 100).toFixed(2).padStart(6));
		stdout.cursorTo(0);
		stdout.moveCursor(0, 1);

		if (this.counter === this.total) this.finish();
	}

	private finish() {
		stdout.moveCursor(0, -1);
		stdout.write(chalk.green('✓'));
		stdout.cursorTo(0);
		stdout.moveCursor(0, 1);
		stdout.off('resize', this.onResize);
	}

	private resize() {
		let { columns } = termSize();
		if (platform === 'win32') columns--;
		this.columns = columns;
	}
}
