/**
 * 상품 관계 그래프 관리
 *
 * - 관계 참조 해석 (working set 스냅샷 기준)
 * - 루트 관계 전파 (트리의 모든 비루트 노드 → 루트)
 * - 연쇄 삭제 계획 (bundled 간선 기준, 자식 먼저)
 *
 * 모든 연산은 동기 + 입력 불변 (새 객체 반환)
 * 그래프 탐색은 명시적 스택 + 방문 집합으로 수행
 */

import {
  isRootProduct,
  Product,
  ProductRelationship,
  toProductRef,
} from "@/core/domain/Product";
import { ProductArena } from "@/core/domain/ProductArena";
import { ProductStatus } from "@/core/domain/ProductStatus";
import {
  CyclicRelationshipDetectedError,
  InvalidProductDeleteStatusError,
  ProductsNotFoundError,
} from "@/core/interfaces/ProductErrorType";
import { PRODUCT_CONSTANTS } from "@/config/constants";
import { Logger } from "@/config/logger";
import { createComponentLogger } from "@/utils/LoggerContext";

/**
 * 연쇄 삭제 단계
 * - unlinkInbound: 해당 상품을 가리키는 bundled 관계 제거
 * - delete: 상품 삭제
 */
export type CascadeDeleteStep =
  | { kind: "unlinkInbound"; ident: string }
  | { kind: "delete"; ident: string };

interface TraversalFrame {
  ident: string;
  path: string[];
}

interface DeleteFrame extends TraversalFrame {
  phase: "enter" | "exit";
}

function hasRootRelationship(product: Product): boolean {
  return product.productRelationships.some(
    (relationship) => relationship.relationshipType === PRODUCT_CONSTANTS.ROOT,
  );
}

export class RelationshipGraphMaintainer {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger =
      logger ?? createComponentLogger("RelationshipGraphMaintainer");
  }

  /**
   * 관계 참조 해석
   *
   * - referencedProducts가 비어 있으면 관계 전체 제거
   * - 그 외에는 모든 관계의 productRef를 referencedProducts에서 찾아 새 관계로 교체
   *
   * @throws ProductsNotFoundError 참조 대상이 referencedProducts에 없음
   */
  normalizeAndResolve(
    product: Product,
    referencedProducts: readonly Product[],
  ): Product {
    if (referencedProducts.length === 0) {
      return { ...product, productRelationships: [] };
    }

    const snapshot: ReadonlyMap<string, Product> = new Map(
      referencedProducts.map((referenced) => [referenced.ident, referenced]),
    );
    const missing: string[] = [];
    const resolved: ProductRelationship[] = [];

    for (const relationship of product.productRelationships) {
      const ident = relationship.productRef.ident;
      const target = snapshot.get(ident);

      if (!target) {
        if (!missing.includes(ident)) {
          missing.push(ident);
        }
        continue;
      }

      resolved.push({
        relationshipType: relationship.relationshipType,
        productRef: toProductRef(target),
      });
    }

    if (missing.length > 0) {
      throw new ProductsNotFoundError(missing);
    }

    return { ...product, productRelationships: resolved };
  }

  /**
   * 루트 관계 전파
   *
   * 루트에서 출발해 root 이외의 모든 간선을 깊이 우선으로 따라가며,
   * 루트 관계가 없는 노드에 루트를 가리키는 관계를 추가한다.
   * 다른 경로로 이미 방문한 노드는 건너뛴다 (DAG 허용).
   *
   * @returns 관계가 추가된 상품 (방문 순서)
   * @throws CyclicRelationshipDetectedError 간선 대상이 현재 경로에 이미 있음
   * @throws ProductsNotFoundError 간선 대상이 arena에 없음
   */
  propagateRoot(arena: ProductArena, rootIdent: string): Product[] {
    const rootRef = toProductRef(arena.require(rootIdent));
    const visited = new Set<string>();
    const changed: Product[] = [];
    const stack: TraversalFrame[] = [{ ident: rootIdent, path: [rootIdent] }];

    for (let frame = stack.pop(); frame; frame = stack.pop()) {
      if (visited.has(frame.ident)) {
        continue;
      }
      visited.add(frame.ident);

      const node = arena.require(frame.ident);

      if (node.ident !== rootIdent && !hasRootRelationship(node)) {
        changed.push({
          ...node,
          productRelationships: [
            ...node.productRelationships,
            { relationshipType: PRODUCT_CONSTANTS.ROOT, productRef: rootRef },
          ],
        });
        this.logger.debug(
          { ident: node.ident, root: rootIdent },
          "[RelationshipGraphMaintainer] 루트 관계 추가",
        );
      }

      const children = arena
        .edgesFrom(node.ident)
        .filter((edge) => edge.type !== PRODUCT_CONSTANTS.ROOT);

      // 스택이므로 역순으로 넣어야 관계 순서대로 방문
      for (const edge of [...children].reverse()) {
        const path = [...frame.path, edge.toIdent];
        if (frame.path.includes(edge.toIdent)) {
          throw new CyclicRelationshipDetectedError(path);
        }
        stack.push({ ident: edge.toIdent, path });
      }
    }

    return changed;
  }

  /**
   * 연쇄 삭제 계획
   *
   * - 상태 검사는 최상위 상품에 대해서만 수행 (자식은 상태와 무관하게 삭제)
   * - 비루트 노드마다 진입 시 unlinkInbound, bundled 자식 처리 후 delete
   *
   * @throws InvalidProductDeleteStatusError 최상위 상품이 TERMINATED가 아님
   * @throws CyclicRelationshipDetectedError 같은 노드에 두 번 도달
   */
  planCascadingDelete(arena: ProductArena, ident: string): CascadeDeleteStep[] {
    const target = arena.require(ident);
    if (target.status !== ProductStatus.TERMINATED) {
      throw new InvalidProductDeleteStatusError(ident, target.status);
    }

    const steps: CascadeDeleteStep[] = [];
    const visited = new Set<string>();
    const stack: DeleteFrame[] = [{ ident, path: [ident], phase: "enter" }];

    for (let frame = stack.pop(); frame; frame = stack.pop()) {
      if (frame.phase === "exit") {
        steps.push({ kind: "delete", ident: frame.ident });
        continue;
      }

      if (visited.has(frame.ident)) {
        throw new CyclicRelationshipDetectedError(frame.path);
      }
      visited.add(frame.ident);

      const node = arena.require(frame.ident);
      if (!isRootProduct(node)) {
        steps.push({ kind: "unlinkInbound", ident: node.ident });
      }

      stack.push({ ...frame, phase: "exit" });

      const children = arena
        .edgesFrom(node.ident)
        .filter((edge) => edge.type === PRODUCT_CONSTANTS.BUNDLED);

      for (const edge of [...children].reverse()) {
        stack.push({
          ident: edge.toIdent,
          path: [...frame.path, edge.toIdent],
          phase: "enter",
        });
      }
    }

    this.logger.debug(
      { ident, steps: steps.length },
      "[RelationshipGraphMaintainer] 연쇄 삭제 계획 생성",
    );

    return steps;
  }
}
