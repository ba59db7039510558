import * as fs from "node:fs";
import { StdinBuffer } from "./stdin-buffer.js";

/**
 * 编辑器使用的最小终端接口
 */
export interface Terminal {
	// 启动终端，设置输入和调整大小的处理程序
	start(onInput: (data: string) => void, onResize: () => void): void;

	// 停止终端并恢复状态
	stop(): void;

	// 向终端写入输出
	write(data: string): void;

	// 获取终端尺寸
	get columns(): number;
	get rows(): number;

	// 光标定位（绝对位置，从 0 开始）
	moveTo(column: number, row: number): void;

	// 光标可见性
	hideCursor(): void;
	showCursor(): void;

	// 清除操作
	clearLine(): void; // 从光标清除到行尾
	clearScreen(): void; // 清除整个屏幕并将光标移动到 (0,0)

	// 设置终端窗口标题
	setTitle(title: string): void;
}

/**
 * 使用 process.stdin/stdout 的真实终端。在备用屏幕上以原始模式运行。
 */
export class ProcessTerminal implements Terminal {
	private wasRaw = false;
	private inputHandler?: (data: string) => void;
	private resizeHandler?: () => void;
	private stdinBuffer?: StdinBuffer;
	private stdinDataHandler?: (data: string) => void;
	private writeLogPath = process.env.XED_TUI_WRITE_LOG || "";

	start(onInput: (data: string) => void, onResize: () => void): void {
		this.inputHandler = onInput;
		this.resizeHandler = onResize;

		// 保存之前的状态并启用原始模式
		this.wasRaw = process.stdin.isRaw || false;
		if (process.stdin.setRawMode) {
			process.stdin.setRawMode(true);
		}
		process.stdin.setEncoding("utf8");
		process.stdin.resume();

		// 进入备用屏幕，启用括号粘贴模式
		process.stdout.write("\x1b[?1049h\x1b[?2004h");
		process.stdout.on("resize", onResize);

		const buffer = new StdinBuffer({ timeout: 10 });
		buffer.on("data", (sequence) => {
			this.inputHandler?.(sequence);
		});
		// 粘贴内容重新包裹括号粘贴标记，由编辑器整体处理
		buffer.on("paste", (content) => {
			this.inputHandler?.(`\x1b[200~${content}\x1b[201~`);
		});
		this.stdinBuffer = buffer;
		this.stdinDataHandler = (data: string) => {
			buffer.process(data);
		};
		process.stdin.on("data", this.stdinDataHandler);
	}

	stop(): void {
		// 禁用括号粘贴模式，离开备用屏幕
		process.stdout.write("\x1b[?2004l\x1b[?25h\x1b[?1049l");

		if (this.stdinBuffer) {
			this.stdinBuffer.destroy();
			this.stdinBuffer = undefined;
		}
		if (this.stdinDataHandler) {
			process.stdin.removeListener("data", this.stdinDataHandler);
			this.stdinDataHandler = undefined;
		}
		this.inputHandler = undefined;
		if (this.resizeHandler) {
			process.stdout.removeListener("resize", this.resizeHandler);
			this.resizeHandler = undefined;
		}

		// 暂停 stdin，以防止在禁用原始模式后重新解释任何缓冲输入
		process.stdin.pause();

		if (process.stdin.setRawMode) {
			process.stdin.setRawMode(this.wasRaw);
		}
	}

	write(data: string): void {
		process.stdout.write(data);
		if (this.writeLogPath) {
			try {
				fs.appendFileSync(this.writeLogPath, data, { encoding: "utf8" });
			} catch (error) {
				// 日志写入失败后不再尝试
				this.writeLogPath = "";
				process.stderr.write(`xed: disabled write log: ${error instanceof Error ? error.message : String(error)}\n`);
			}
		}
	}

	get columns(): number {
		return process.stdout.columns || 80;
	}

	get rows(): number {
		return process.stdout.rows || 24;
	}

	moveTo(column: number, row: number): void {
		process.stdout.write(cursorPosition(column, row));
	}

	hideCursor(): void {
		process.stdout.write("\x1b[?25l");
	}

	showCursor(): void {
		process.stdout.write("\x1b[?25h");
	}

	clearLine(): void {
		process.stdout.write("\x1b[K");
	}

	clearScreen(): void {
		process.stdout.write("\x1b[2J\x1b[H");
	}

	setTitle(title: string): void {
		// OSC 0;title BEL - 设置终端窗口标题
		process.stdout.write(`\x1b]0;${title}\x07`);
	}
}

/**
 * CUP 序列，参数从 0 开始（终端从 1 开始计数）
 */
export function cursorPosition(column: number, row: number): string {
	return `\x1b[${row + 1};${column + 1}H`;
}
