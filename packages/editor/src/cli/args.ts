/**
 * CLI 参数解析和帮助显示
 */

import chalk from "chalk";
import { APP_NAME, CONFIG_DIR_NAME, ENV_CONFIG_DIR, ENV_DEBUG_LOG } from "../config.js";

export interface Args {
	help?: boolean;
	version?: boolean;
	/** 以插入模式启动 */
	insert?: boolean;
	/** 要打开的文件，第一个为当前文档 */
	files: string[];
}

export function parseArgs(args: string[]): Args {
	const result: Args = {
		files: [],
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];

		if (arg === "--help" || arg === "-h") {
			result.help = true;
		} else if (arg === "--version" || arg === "-v") {
			result.version = true;
		} else if (arg === "--insert" || arg === "-i") {
			result.insert = true;
		} else if (arg === "--") {
			// 之后的所有参数都是文件名
			result.files.push(...args.slice(i + 1));
			break;
		} else if (arg.startsWith("-") && arg !== "-") {
			console.error(chalk.yellow(`Warning: Unknown option "${arg}" (see ${APP_NAME} --help)`));
		} else {
			result.files.push(arg);
		}
	}

	return result;
}

export function printHelp(): void {
	console.log(`${chalk.bold(APP_NAME)} - 带搜索和关键字高亮的模态终端文本编辑器

${chalk.bold("Usage:")}
  ${APP_NAME} [options] [files...]

${chalk.bold("Commands:")}
  ${APP_NAME} keywords <primary.txt> <secondary.txt> --name <name> --ext <.ext>
                                 从两个单词列表生成 filetypes.json 条目

${chalk.bold("Options:")}
  --insert, -i                   以插入模式启动
  --help, -h                     显示此帮助信息
  --version, -v                  显示版本号

${chalk.bold("Keys:")}
  i / Esc                        进入插入模式 / 返回查看模式
  h j k l, 方向键                移动光标
  Ctrl+S                         保存（未命名时提示文件名）
  Ctrl+Q                         退出（有未保存的修改时确认）
  Ctrl+F                         搜索（方向键跳到下一个/上一个匹配）
  Ctrl+N                         打开文件
  Ctrl+T                         切换到下一个文档

${chalk.bold("Configuration:")}
  ~/${CONFIG_DIR_NAME}/settings.json            全局设置
  ./${CONFIG_DIR_NAME}/settings.json            项目设置（覆盖全局设置）
  ~/${CONFIG_DIR_NAME}/filetypes.json           自定义文件类型

${chalk.bold("Environment Variables:")}
  ${ENV_CONFIG_DIR.padEnd(30)} - 配置目录 (默认: ~/${CONFIG_DIR_NAME})
  ${ENV_DEBUG_LOG.padEnd(30)} - 调试日志文件路径
  ${"XED_TUI_WRITE_LOG".padEnd(30)} - 记录所有终端输出的文件路径
`);
}
