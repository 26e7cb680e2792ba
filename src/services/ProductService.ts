/**
 * Product Service
 *
 * 상품 생명주기 오케스트레이션
 * - 생성 (초기 상태 검증, ident/href/계약번호 할당)
 * - 저장 (관계 해석 + 루트 관계 전파)
 * - 상태 변경 (전이 검증)
 * - 연쇄 삭제 (bundled 하위 트리)
 * - 검색 / CSV Export / 만료 상품 종료
 *
 * SOLID 원칙:
 * - SRP: 저장소 I/O와 코어 컴포넌트 연결만 담당 (규칙은 각 컴포넌트에 위임)
 * - DIP: IProductRepository / IProductRelationshipRepository 추상화에 의존
 */

import { v4 as uuidv4 } from "uuid";
import {
  isRootProduct,
  Product,
  ProductDraft,
} from "@/core/domain/Product";
import { ProductArena, RelationshipEdge } from "@/core/domain/ProductArena";
import { ProductStatus } from "@/core/domain/ProductStatus";
import { SearchCriteria } from "@/core/domain/SearchCriteria";
import {
  IProductRelationshipRepository,
  IProductRepository,
  InvalidProductDeleteStatusError,
  ProductNotFoundError,
  ProductsNotFoundError,
} from "@/core/interfaces";
import { StatusTransitionValidator } from "@/services/StatusTransitionValidator";
import {
  CascadeDeleteStep,
  RelationshipGraphMaintainer,
} from "@/services/RelationshipGraphMaintainer";
import { ProductCsvExporter } from "@/services/ProductCsvExporter";
import { PRODUCT_CONSTANTS } from "@/config/constants";
import { Logger } from "@/config/logger";
import { createComponentLogger } from "@/utils/LoggerContext";

/**
 * href 설정
 */
export interface ProductHrefOptions {
  hrefBasePath: string;
  hrefProductPath: string;
}

/**
 * 교체 가능한 협력 컴포넌트 (테스트용)
 */
export interface ProductServiceComponents {
  validator?: StatusTransitionValidator;
  maintainer?: RelationshipGraphMaintainer;
  exporter?: ProductCsvExporter;
  logger?: Logger;
  generateIdent?: () => string;
}

/**
 * 상품 갱신 요청 (ident, href, 계약번호는 변경 불가)
 */
export type ProductUpdate = ProductDraft;

const followNonRootEdges = (edge: RelationshipEdge): boolean =>
  edge.type !== PRODUCT_CONSTANTS.ROOT;

const followBundledEdges = (edge: RelationshipEdge): boolean =>
  edge.type === PRODUCT_CONSTANTS.BUNDLED;

export class ProductService {
  private readonly validator: StatusTransitionValidator;
  private readonly maintainer: RelationshipGraphMaintainer;
  private readonly exporter: ProductCsvExporter;
  private readonly logger: Logger;
  private readonly generateIdent: () => string;
  private readonly hrefPrefix: string;

  constructor(
    private readonly productRepository: IProductRepository,
    private readonly relationshipRepository: IProductRelationshipRepository,
    hrefOptions: ProductHrefOptions,
    components: ProductServiceComponents = {},
  ) {
    this.hrefPrefix = `${hrefOptions.hrefBasePath}${hrefOptions.hrefProductPath}/`;
    this.validator = components.validator ?? new StatusTransitionValidator();
    this.maintainer =
      components.maintainer ?? new RelationshipGraphMaintainer();
    this.exporter = components.exporter ?? new ProductCsvExporter();
    this.logger = components.logger ?? createComponentLogger("ProductService");
    this.generateIdent = components.generateIdent ?? uuidv4;
  }

  /**
   * 상품 생성
   *
   * - 상태 미지정 시 CREATED, 그 외 상태는 거부
   * - 루트 상품에만 계약번호 할당
   *
   * @throws InvalidProductInitialStatusError
   * @throws ProductsNotFoundError 관계 참조 해석 실패
   */
  async insert(
    draft: ProductDraft,
    referencedProducts: readonly Product[],
  ): Promise<Product> {
    const status = this.validator.validateInitialStatus(draft.status);
    const ident = this.generateIdent();
    const contractNumber = isRootProduct(draft)
      ? await this.nextContractNumber()
      : null;

    const product: Product = {
      ...draft,
      ident,
      href: this.hrefPrefix + ident,
      status,
      contractNumber,
    };

    this.logger.info(
      { ident, baseType: product.baseType, contractNumber },
      "[ProductService] 상품 생성",
    );

    return this.storeProduct(product, referencedProducts);
  }

  /**
   * 상품 저장
   *
   * 관계를 referencedProducts 기준으로 해석한 뒤,
   * 루트 상품이면 하위 트리 전체에 루트 관계를 전파하고 변경된 상품도 함께 저장
   */
  async storeProduct(
    product: Product,
    referencedProducts: readonly Product[],
  ): Promise<Product> {
    const resolved = this.maintainer.normalizeAndResolve(
      product,
      referencedProducts,
    );

    if (!isRootProduct(resolved)) {
      return this.productRepository.save(resolved);
    }

    const arena = await this.loadTree(
      [...referencedProducts, resolved],
      [resolved.ident],
      followNonRootEdges,
    );
    const changed = this.maintainer.propagateRoot(arena, resolved.ident);

    const saved = await this.productRepository.save(resolved);
    for (const descendant of changed) {
      await this.productRepository.save(descendant);
    }

    this.logger.info(
      { ident: saved.ident, rootRelationshipsAdded: changed.length },
      "[ProductService] 루트 상품 저장 완료",
    );

    return saved;
  }

  /**
   * 상품 갱신 (상태 변경 시 전이 검증)
   *
   * ident, href는 유지. 계약번호는 baseType에 맞춤
   * (루트 유지 시 기존 번호, 루트로 변경 시 신규 할당, 비루트로 변경 시 제거)
   */
  async updateProduct(
    ident: string,
    update: ProductUpdate,
    referencedProducts: readonly Product[],
  ): Promise<Product> {
    const existing = await this.getProductByIdent(ident);
    const status = update.status ?? existing.status;
    this.validateStatusTransition(existing.status, status);

    const merged: Product = {
      ...existing,
      ...update,
      ident: existing.ident,
      href: existing.href,
      status,
    };

    return this.storeProduct(
      { ...merged, contractNumber: await this.contractNumberFor(merged, existing) },
      referencedProducts,
    );
  }

  /**
   * 상태 변경
   * @throws InvalidStatusTransitionError
   */
  async changeStatus(ident: string, next: ProductStatus): Promise<Product> {
    const product = await this.getProductByIdent(ident);
    this.validateStatusTransition(product.status, next);

    if (product.status === next) {
      return product;
    }

    this.logger.info(
      { ident, previous: product.status, next },
      "[ProductService] 상태 변경",
    );

    return this.productRepository.save({ ...product, status: next });
  }

  /**
   * @throws InvalidStatusTransitionError
   */
  validateStatusTransition(previous: ProductStatus, next: ProductStatus): void {
    this.validator.validate(previous, next);
  }

  /**
   * from 상태에서 전이 가능한 상태 목록 (self-loop 제외)
   */
  allowedTransitions(from: ProductStatus): ProductStatus[] {
    return this.validator.allowedTransitions(from);
  }

  /**
   * @throws ProductNotFoundError
   */
  async getProductByIdent(ident: string): Promise<Product> {
    const product = await this.productRepository.findByIdent(ident);
    if (!product) {
      throw new ProductNotFoundError(ident);
    }
    return product;
  }

  /**
   * ident 목록 조회 (요청 순서대로 반환, 중복 ident는 1회)
   * @throws ProductsNotFoundError 누락된 ident 목록 포함
   */
  async getProductsByIdents(idents: Iterable<string>): Promise<Product[]> {
    const requested = Array.from(new Set(idents));
    const products = await this.productRepository.findByIdents(requested);
    const found = new Map(products.map((product) => [product.ident, product]));

    const missing = requested.filter((ident) => !found.has(ident));
    if (missing.length > 0) {
      throw new ProductsNotFoundError(missing);
    }

    return requested.flatMap((ident) => {
      const product = found.get(ident);
      return product ? [product] : [];
    });
  }

  /**
   * 상품 관계가 참조하는 상품 조회 (storeProduct의 referencedProducts 준비용)
   */
  async getReferencedProducts(
    relationships: ProductDraft["productRelationships"],
  ): Promise<Product[]> {
    return this.getProductsByIdents(
      relationships.map((relationship) => relationship.productRef.ident),
    );
  }

  async searchProduct(criteria: SearchCriteria): Promise<Product[]> {
    return this.productRepository.findBySearchCriteria(criteria);
  }

  /**
   * CSV Export
   * @throws ProductsNotFoundError
   */
  async exportProduct(idents: Iterable<string>): Promise<Buffer> {
    const products = await this.getProductsByIdents(idents);
    return this.exporter.export(products);
  }

  /**
   * 연쇄 삭제
   *
   * 상태 확인 후 bundled 하위 트리를 모두 조회하고 계획을 세워 순서대로 실행
   * (계획 단계에서 실패하면 아무것도 삭제하지 않음)
   *
   * @returns 삭제된 ident (삭제 순서)
   * @throws ProductNotFoundError
   * @throws InvalidProductDeleteStatusError
   */
  async deleteProduct(ident: string): Promise<string[]> {
    const product = await this.getProductByIdent(ident);
    if (product.status !== ProductStatus.TERMINATED) {
      throw new InvalidProductDeleteStatusError(ident, product.status);
    }

    const arena = await this.loadTree([product], [ident], followBundledEdges);
    const steps = this.maintainer.planCascadingDelete(arena, ident);

    const deleted: string[] = [];
    for (const step of steps) {
      await this.executeDeleteStep(step);
      if (step.kind === "delete") {
        deleted.push(step.ident);
      }
    }

    this.logger.info({ ident, deleted }, "[ProductService] 연쇄 삭제 완료");

    return deleted;
  }

  async terminateExpiredProducts(): Promise<number> {
    this.logger.debug("[ProductService] 만료 상품 종료 시작");
    const terminated = await this.productRepository.terminateExpiredProducts();
    this.logger.info({ terminated }, "[ProductService] 만료 상품 종료 완료");
    return terminated;
  }

  private async executeDeleteStep(step: CascadeDeleteStep): Promise<void> {
    switch (step.kind) {
      case "unlinkInbound":
        this.logger.debug(
          { relationshipType: PRODUCT_CONSTANTS.BUNDLED, productRef: step.ident },
          "[ProductService] 상위 상품의 bundled 관계 삭제",
        );
        await this.relationshipRepository.deleteByTypeAndProductRef(
          PRODUCT_CONSTANTS.BUNDLED,
          step.ident,
        );
        return;

      case "delete":
        this.logger.debug({ ident: step.ident }, "[ProductService] 상품 삭제");
        await this.productRepository.delete(step.ident);
        return;
    }
  }

  private async contractNumberFor(
    product: Product,
    existing: Product,
  ): Promise<string | null> {
    if (!isRootProduct(product)) {
      return null;
    }
    return existing.contractNumber ?? (await this.nextContractNumber());
  }

  private async nextContractNumber(): Promise<string> {
    const seriesId = await this.productRepository.nextSeriesId();
    return (
      PRODUCT_CONSTANTS.CONTRACT_NUMBER_PREFIX +
      String(seriesId).padStart(PRODUCT_CONSTANTS.CONTRACT_NUMBER_DIGITS, "0")
    );
  }

  /**
   * 시작 노드에서 follow 조건을 만족하는 간선을 따라가며
   * 아직 로드되지 않은 상품을 레벨 단위로 저장소에서 조회
   *
   * 이미 arena에 있는 상품은 다시 조회하지 않음 (순환 시에도 종료)
   */
  private async loadTree(
    known: readonly Product[],
    startIdents: string[],
    follow: (edge: RelationshipEdge) => boolean,
  ): Promise<ProductArena> {
    let arena = ProductArena.fromProducts(known);
    const expanded = new Set<string>();
    let frontier = startIdents;

    while (frontier.length > 0) {
      const pending = new Set<string>();

      for (const ident of frontier) {
        if (expanded.has(ident)) {
          continue;
        }
        expanded.add(ident);

        for (const edge of arena.edgesFrom(ident).filter(follow)) {
          pending.add(edge.toIdent);
        }
      }

      const missing = Array.from(pending).filter((ident) => !arena.has(ident));
      if (missing.length > 0) {
        arena = arena.with(await this.getProductsByIdents(missing));
      }

      frontier = Array.from(pending).filter((ident) => !expanded.has(ident));
    }

    return arena;
  }
}
