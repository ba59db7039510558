import { appendFileSync } from "fs";

/**
 * 追加到文件的调试日志。编辑器运行时占用终端，因此不写 stdout/stderr。
 * 路径为 undefined 时所有调用都是空操作；写入失败后停止记录，原因通过 getDisabledReason() 获取。
 */
export class DebugLog {
	private path: string | undefined;
	private disabledReason: string | undefined;

	constructor(path: string | undefined) {
		this.path = path;
	}

	get enabled(): boolean {
		return this.path !== undefined;
	}

	/** 写入失败而停止记录时的错误描述 */
	getDisabledReason(): string | undefined {
		return this.disabledReason;
	}

	log(message: string): void {
		if (!this.path) return;
		try {
			appendFileSync(this.path, `[${new Date().toISOString()}] ${message}\n`, { encoding: "utf8" });
		} catch (error) {
			this.disabledReason = `${this.path}: ${error instanceof Error ? error.message : String(error)}`;
			this.path = undefined;
		}
	}
}
