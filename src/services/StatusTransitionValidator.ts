/**
 * 상품 상태 전이 검증
 *
 * SOLID 원칙:
 * - SRP: 상태 전이 규칙 검증만 담당 (부수 효과 없음)
 * - OCP: 전이 규칙은 PRODUCT_STATUS_TRANSITIONS 테이블에서 관리
 */

import {
  PRODUCT_STATUS_TRANSITIONS,
  ProductStatus,
} from "@/core/domain/ProductStatus";
import {
  InvalidProductInitialStatusError,
  InvalidStatusTransitionError,
} from "@/core/interfaces/ProductErrorType";

export class StatusTransitionValidator {
  constructor(
    private readonly transitions: ReadonlyMap<
      ProductStatus,
      ReadonlySet<ProductStatus>
    > = PRODUCT_STATUS_TRANSITIONS,
  ) {}

  /**
   * 전이 가능 여부
   */
  canTransition(previous: ProductStatus, next: ProductStatus): boolean {
    if (previous === next) {
      return true;
    }
    return this.transitions.get(previous)?.has(next) ?? false;
  }

  /**
   * 상태 전이 검증
   * @throws InvalidStatusTransitionError 허용되지 않은 전이
   */
  validate(previous: ProductStatus, next: ProductStatus): void {
    if (!this.canTransition(previous, next)) {
      throw new InvalidStatusTransitionError(
        previous,
        next,
        this.allowedTransitions(previous),
      );
    }
  }

  /**
   * from 상태에서 전이 가능한 상태 목록 (self-loop 제외)
   */
  allowedTransitions(from: ProductStatus): ProductStatus[] {
    return Array.from(this.transitions.get(from) ?? []);
  }

  /**
   * 생성 시 초기 상태 검증
   * 미지정 시 CREATED
   * @throws InvalidProductInitialStatusError CREATED 이외의 상태
   */
  validateInitialStatus(status?: ProductStatus | null): ProductStatus {
    const initial = status ?? ProductStatus.CREATED;
    if (initial !== ProductStatus.CREATED) {
      throw new InvalidProductInitialStatusError(initial);
    }
    return initial;
  }
}
