/**
 * ProductArena
 *
 * ident → Product 평면 맵 + (fromIdent, type, toIdent) 간선 뷰
 * 그래프 탐색(루트 전파, 연쇄 삭제)은 객체 참조 대신 이 맵을 통해 수행
 *
 * 불변: 생성 후 내용 변경 불가 (with()는 새 Arena 반환)
 */

import { Product } from "@/core/domain/Product";
import { ProductsNotFoundError } from "@/core/interfaces/ProductErrorType";

/**
 * 관계 간선
 */
export interface RelationshipEdge {
  fromIdent: string;
  type: string;
  toIdent: string;
}

export class ProductArena {
  private readonly products: ReadonlyMap<string, Product>;

  private constructor(products: ReadonlyMap<string, Product>) {
    this.products = products;
  }

  /**
   * 상품 목록으로 Arena 생성 (ident 중복 시 뒤쪽 항목 우선)
   */
  static fromProducts(products: Iterable<Product>): ProductArena {
    const map = new Map<string, Product>();
    for (const product of products) {
      map.set(product.ident, product);
    }
    return new ProductArena(map);
  }

  has(ident: string): boolean {
    return this.products.has(ident);
  }

  /**
   * 조회 실패 시 ProductsNotFoundError
   */
  require(ident: string): Product {
    const product = this.products.get(ident);
    if (!product) {
      throw new ProductsNotFoundError([ident]);
    }
    return product;
  }

  /**
   * 나가는 간선 (관계 순서 유지)
   */
  edgesFrom(ident: string): RelationshipEdge[] {
    return this.require(ident).productRelationships.map((relationship) => ({
      fromIdent: ident,
      type: relationship.relationshipType,
      toIdent: relationship.productRef.ident,
    }));
  }

  /**
   * 일부 상품을 교체한 새 Arena
   */
  with(updated: Iterable<Product>): ProductArena {
    const map = new Map(this.products);
    for (const product of updated) {
      map.set(product.ident, product);
    }
    return new ProductArena(map);
  }
}
