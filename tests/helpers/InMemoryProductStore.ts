/**
 * In-memory Product Store (테스트용)
 *
 * IProductRepository + IProductRelationshipRepository 동시 구현
 * 쓰기 호출은 calls에 순서대로 기록
 */

import { Product } from "@/core/domain/Product";
import { ProductStatus } from "@/core/domain/ProductStatus";
import { SearchCriteria } from "@/core/domain/SearchCriteria";
import {
  IProductRelationshipRepository,
  IProductRepository,
} from "@/core/interfaces";

export class InMemoryProductStore
  implements IProductRepository, IProductRelationshipRepository
{
  readonly products = new Map<string, Product>();
  readonly calls: string[] = [];
  private seriesId: number;
  private readonly now: Date;

  constructor(
    initial: Product[] = [],
    options: { seriesStart?: number; now?: Date } = {},
  ) {
    initial.forEach((product) => this.products.set(product.ident, product));
    this.seriesId = options.seriesStart ?? 0;
    this.now = options.now ?? new Date();
  }

  async findByIdent(ident: string): Promise<Product | null> {
    return this.products.get(ident) ?? null;
  }

  async findByIdents(idents: string[]): Promise<Product[]> {
    return idents.flatMap((ident) => {
      const product = this.products.get(ident);
      return product ? [product] : [];
    });
  }

  async save(product: Product): Promise<Product> {
    this.calls.push(`save:${product.ident}`);
    this.products.set(product.ident, product);
    return product;
  }

  async delete(ident: string): Promise<void> {
    this.calls.push(`delete:${ident}`);
    this.products.delete(ident);
  }

  async nextSeriesId(): Promise<number> {
    this.seriesId += 1;
    return this.seriesId;
  }

  async terminateExpiredProducts(): Promise<number> {
    let terminated = 0;
    for (const product of this.products.values()) {
      const expired =
        product.terminationDate !== null &&
        product.terminationDate !== undefined &&
        product.terminationDate.getTime() <= this.now.getTime();
      const terminable =
        product.status === ProductStatus.ACTIVE ||
        product.status === ProductStatus.PENDINGTERMINATE;

      if (expired && terminable) {
        this.products.set(product.ident, {
          ...product,
          status: ProductStatus.TERMINATED,
        });
        terminated++;
      }
    }
    return terminated;
  }

  async findBySearchCriteria(criteria: SearchCriteria): Promise<Product[]> {
    const nameFilter = criteria.name?.toLowerCase();
    return Array.from(this.products.values())
      .filter((product) => !criteria.status || product.status === criteria.status)
      .filter(
        (product) => !criteria.baseType || product.baseType === criteria.baseType,
      )
      .filter(
        (product) =>
          !nameFilter || (product.name ?? "").toLowerCase().includes(nameFilter),
      )
      .slice(0, criteria.limit);
  }

  async deleteByTypeAndProductRef(
    relationshipType: string,
    refIdent: string,
  ): Promise<void> {
    this.calls.push(`unlink:${relationshipType}:${refIdent}`);
    for (const product of Array.from(this.products.values())) {
      const remaining = product.productRelationships.filter(
        (relationship) =>
          !(
            relationship.relationshipType === relationshipType &&
            relationship.productRef.ident === refIdent
          ),
      );
      if (remaining.length !== product.productRelationships.length) {
        this.products.set(product.ident, {
          ...product,
          productRelationships: remaining,
        });
      }
    }
  }
}
