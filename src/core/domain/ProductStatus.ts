/**
 * 상품 상태
 */
export enum ProductStatus {
  CREATED = "CREATED",
  ACTIVE = "ACTIVE",
  ABORTED = "ABORTED",
  TERMINATED = "TERMINATED",
  PENDINGTERMINATE = "PENDINGTERMINATE",
}

/**
 * 허용된 상태 전이 (방향 그래프)
 * 동일 상태로의 전이(self-loop)는 별도로 항상 허용
 */
export const PRODUCT_STATUS_TRANSITIONS: ReadonlyMap<
  ProductStatus,
  ReadonlySet<ProductStatus>
> = new Map([
  [
    ProductStatus.CREATED,
    new Set([ProductStatus.ACTIVE, ProductStatus.ABORTED]),
  ],
  [
    ProductStatus.ACTIVE,
    new Set([ProductStatus.TERMINATED, ProductStatus.PENDINGTERMINATE]),
  ],
  [ProductStatus.TERMINATED, new Set([ProductStatus.ACTIVE])],
  [
    ProductStatus.PENDINGTERMINATE,
    new Set([ProductStatus.TERMINATED, ProductStatus.ACTIVE]),
  ],
  [ProductStatus.ABORTED, new Set<ProductStatus>()],
]);
