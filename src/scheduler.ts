/**
 * 만료 상품 종료 스케줄러
 *
 * node-cron 기반
 * - TERMINATE_EXPIRED_CRON (기본: 매일 03:00)에 terminateExpiredProducts 실행
 * - 실행 중 중복 트리거는 스킵
 *
 * 사용:
 * - npm run scheduler
 */

import "dotenv/config";
import cron from "node-cron";
import { ProductService } from "@/services/ProductService";
import { createProductService } from "@/services/ProductServiceFactory";
import { createServiceLogger } from "@/utils/LoggerContext";
import { SCHEDULER_CONFIG, SERVICE_NAMES } from "@/config/constants";
import { Logger } from "@/config/logger";

/**
 * 만료 상품 종료 작업
 * 실행 중이면 스킵 (true: 실행함, false: 스킵)
 */
export class TerminateExpiredProductsJob {
  private running = false;

  constructor(
    private readonly productService: ProductService,
    private readonly logger: Logger,
  ) {}

  async run(): Promise<boolean> {
    if (this.running) {
      this.logger.warn("[Scheduler] 이전 실행이 진행 중 - 스킵");
      return false;
    }

    this.running = true;
    const startedAt = Date.now();

    try {
      const terminated = await this.productService.terminateExpiredProducts();
      this.logger.info(
        { terminated, duration_ms: Date.now() - startedAt },
        "[Scheduler] 만료 상품 종료 완료",
      );
    } catch (error) {
      this.logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        "[Scheduler] 만료 상품 종료 실패",
      );
    } finally {
      this.running = false;
    }

    return true;
  }
}

function main(): void {
  const logger = createServiceLogger(SERVICE_NAMES.SCHEDULER);

  if (!cron.validate(SCHEDULER_CONFIG.TERMINATE_EXPIRED_CRON)) {
    throw new Error(
      `Invalid TERMINATE_EXPIRED_CRON: ${SCHEDULER_CONFIG.TERMINATE_EXPIRED_CRON}`,
    );
  }

  const job = new TerminateExpiredProductsJob(createProductService(), logger);

  const task = cron.schedule(
    SCHEDULER_CONFIG.TERMINATE_EXPIRED_CRON,
    async () => {
      logger.info("[Scheduler] Cron 트리거됨");
      await job.run();
    },
    { timezone: SCHEDULER_CONFIG.TIMEZONE },
  );

  logger.info(
    {
      cron: SCHEDULER_CONFIG.TERMINATE_EXPIRED_CRON,
      timezone: SCHEDULER_CONFIG.TIMEZONE,
    },
    "[Scheduler] Cron task 스케줄됨",
  );

  const shutdown = (signal: string) => {
    logger.info({ signal }, "[Scheduler] 종료 신호 수신");
    task.stop();
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

if (require.main === module) {
  main();
}
