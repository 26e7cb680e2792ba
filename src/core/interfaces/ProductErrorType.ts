/**
 * Product Error Type Enum
 *
 * 목적:
 * - 비즈니스 규칙 위반 원인 세분화
 * - HTTP 상태 코드 매핑
 *
 * 모든 에러는 종료성(terminal) 에러이며 재시도하지 않음
 */

import { ProductStatus } from "@/core/domain/ProductStatus";

/**
 * Product 에러 타입
 */
export enum ProductErrorType {
  /** 단건 조회 실패 */
  PRODUCT_NOT_FOUND = "PRODUCT_NOT_FOUND",

  /** 다건 조회 / 관계 참조 해석 실패 */
  PRODUCTS_NOT_FOUND = "PRODUCTS_NOT_FOUND",

  /** CREATED 이외의 초기 상태로 생성 시도 */
  INVALID_PRODUCT_INITIAL_STATUS = "INVALID_PRODUCT_INITIAL_STATUS",

  /** TERMINATED 이외 상태에서 삭제 시도 */
  INVALID_PRODUCT_DELETE_STATUS = "INVALID_PRODUCT_DELETE_STATUS",

  /** 허용되지 않은 상태 전이 */
  INVALID_STATUS_TRANSITION = "INVALID_STATUS_TRANSITION",

  /** 번들 트리에 순환(또는 공유 자식) 존재 */
  CYCLIC_RELATIONSHIP_DETECTED = "CYCLIC_RELATIONSHIP_DETECTED",
}

/**
 * Product 에러 기본 클래스
 */
export class ProductError extends Error {
  public readonly type: ProductErrorType;
  public readonly details: Record<string, unknown>;

  constructor(
    type: ProductErrorType,
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "ProductError";
    this.type = type;
    this.details = details;
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      message: this.message,
      ...this.details,
    };
  }

  /**
   * HTTP 상태 코드 매핑
   */
  static httpStatusOf(type: ProductErrorType): number {
    switch (type) {
      case ProductErrorType.PRODUCT_NOT_FOUND:
      case ProductErrorType.PRODUCTS_NOT_FOUND:
        return 404;

      case ProductErrorType.INVALID_PRODUCT_INITIAL_STATUS:
        return 400;

      case ProductErrorType.INVALID_PRODUCT_DELETE_STATUS:
      case ProductErrorType.INVALID_STATUS_TRANSITION:
        return 409;

      case ProductErrorType.CYCLIC_RELATIONSHIP_DETECTED:
        return 422;

      default:
        return 500;
    }
  }
}

export class ProductNotFoundError extends ProductError {
  constructor(public readonly ident?: string) {
    super(ProductErrorType.PRODUCT_NOT_FOUND, "Product not found", { ident });
    this.name = "ProductNotFoundError";
  }
}

export class ProductsNotFoundError extends ProductError {
  constructor(public readonly missingIdents: string[]) {
    super(
      ProductErrorType.PRODUCTS_NOT_FOUND,
      `Products not found: ${missingIdents.join(", ")}`,
      { missingIdents },
    );
    this.name = "ProductsNotFoundError";
  }
}

export class InvalidProductInitialStatusError extends ProductError {
  constructor(public readonly status: ProductStatus) {
    super(
      ProductErrorType.INVALID_PRODUCT_INITIAL_STATUS,
      `Initial product status must be ${ProductStatus.CREATED}, got ${status}`,
      { status },
    );
    this.name = "InvalidProductInitialStatusError";
  }
}

export class InvalidProductDeleteStatusError extends ProductError {
  constructor(
    public readonly ident: string,
    public readonly status: ProductStatus,
  ) {
    super(
      ProductErrorType.INVALID_PRODUCT_DELETE_STATUS,
      `Only ${ProductStatus.TERMINATED} products can be deleted, product ${ident} is ${status}`,
      { ident, status },
    );
    this.name = "InvalidProductDeleteStatusError";
  }
}

export class InvalidStatusTransitionError extends ProductError {
  constructor(
    public readonly previous: ProductStatus,
    public readonly next: ProductStatus,
    allowed: ProductStatus[],
  ) {
    super(
      ProductErrorType.INVALID_STATUS_TRANSITION,
      `Invalid status transition from ${previous} to ${next}`,
      { previous, next, allowed },
    );
    this.name = "InvalidStatusTransitionError";
  }
}

export class CyclicRelationshipDetectedError extends ProductError {
  constructor(public readonly path: string[]) {
    super(
      ProductErrorType.CYCLIC_RELATIONSHIP_DETECTED,
      `Cyclic product relationship detected: ${path.join(" -> ")}`,
      { path },
    );
    this.name = "CyclicRelationshipDetectedError";
  }
}
