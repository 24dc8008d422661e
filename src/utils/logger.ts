import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getConfigManager } from '../core/config';
import type { ConfigManager } from '../core/config';

// 콘솔 트랜스포트는 모든 레벨을 stderr로 보냄 (stdout은 진행 상황 출력용)
const STDERR_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

// 로그 포맷 정의
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let log = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    if (stack) {
      log += `\n${stack}`;
    }
    return log;
  })
);

// 에러는 CLI가 한 줄로 직접 출력하므로 콘솔 트랜스포트에서는 제외
const skipErrors = winston.format((info) => (info.level === 'error' ? false : info));

// 콘솔용 컬러 포맷
const consoleFormat = winston.format.combine(
  skipErrors(),
  winston.format.colorize(),
  winston.format.printf(({ level, message, ...meta }) => {
    let log = `${level}: ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    return log;
  })
);

export interface LoggerOptions {
  /** 파일 로그 레벨 (기본값: info) */
  level?: string;
  /** true면 콘솔에도 debug까지 출력 */
  verbose?: boolean;
  /** 로그 디렉토리를 가져올 설정 관리자 (기본값: getConfigManager()) */
  configManager?: ConfigManager;
}

/**
 * 초기화 전/파일 로그를 쓸 수 없을 때 쓰는 콘솔 전용 로거
 */
function createConsoleLogger(level = 'warn'): winston.Logger {
  return winston.createLogger({
    level,
    format: logFormat,
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
        stderrLevels: STDERR_LEVELS,
      }),
    ],
  });
}

class Logger {
  private logger: winston.Logger;
  private initialized = false;

  constructor() {
    // 기본 로거 생성 (초기화 전 사용)
    this.logger = createConsoleLogger();
  }

  /**
   * 로거를 초기화합니다. ConfigManager에서 로그 경로를 가져옵니다.
   * 로그 디렉토리를 만들 수 없으면 경고만 남기고 콘솔 로거로 계속합니다.
   */
  async initialize(options: LoggerOptions = {}): Promise<void> {
    if (this.initialized) return;

    const configManager = options.configManager ?? getConfigManager();
    const logsDir = configManager.getLogsDir();
    try {
      await configManager.ensureDirectories();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger = createConsoleLogger(options.verbose ? 'debug' : 'warn');
      this.warn(`로그 디렉토리를 만들 수 없어 파일 로그 없이 진행합니다: ${message}`, { logsDir });
      return;
    }
    const fileLevel = options.verbose ? 'debug' : options.level ?? 'info';

    // 파일 로테이션 트랜스포트 설정
    const fileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'fontpkg-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '14d',
      level: fileLevel,
      format: logFormat,
    });

    // 에러 전용 파일 트랜스포트
    const errorFileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '14d',
      level: 'error',
      format: logFormat,
    });

    // 콘솔은 기본적으로 경고 이상만, verbose면 debug까지
    const consoleTransport = new winston.transports.Console({
      level: options.verbose ? 'debug' : 'warn',
      format: consoleFormat,
      stderrLevels: STDERR_LEVELS,
    });

    // 로거 재설정
    this.logger = winston.createLogger({
      level: 'debug',
      format: logFormat,
      transports: [fileTransport, errorFileTransport, consoleTransport],
    });

    this.initialized = true;
    this.debug('로거 초기화 완료', { logsDir });
  }

  /**
   * 에러 로그
   */
  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  /**
   * 경고 로그
   */
  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  /**
   * 정보 로그
   */
  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  /**
   * 디버그 로그
   */
  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * 에러 객체를 로깅합니다.
   */
  logError(error: Error, context?: string): void {
    this.error(context ? `${context}: ${error.message}` : error.message, {
      stack: error.stack,
      name: error.name,
    });
  }

  /**
   * 버퍼에 남은 로그를 파일에 기록하고 트랜스포트를 닫습니다.
   * process.exit() 전에 호출하며, 이후에는 초기화 전 상태(콘솔 전용)로 돌아갑니다.
   */
  async flush(): Promise<void> {
    if (!this.initialized) return;

    const current = this.logger;
    await new Promise<void>((resolve) => {
      current.on('finish', () => resolve());
      current.end();
    });

    this.logger = createConsoleLogger();
    this.initialized = false;
  }
}

// 싱글톤 인스턴스
const logger = new Logger();

export { logger, Logger };
export default logger;
