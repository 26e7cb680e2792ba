/**
 * Product Repository 인터페이스
 *
 * SOLID 원칙:
 * - ISP: 상품 저장/조회만 정의 (관계 정리는 IProductRelationshipRepository)
 * - DIP: 추상화에 의존 (Supabase 구체 구현에 의존하지 않음)
 */

import { Product } from "@/core/domain/Product";
import { SearchCriteria } from "@/core/domain/SearchCriteria";

export interface IProductRepository {
  /**
   * ident로 단건 조회
   * @returns 상품 또는 null
   */
  findByIdent(ident: string): Promise<Product | null>;

  /**
   * ident 목록으로 다건 조회
   * 존재하지 않는 ident는 결과에서 빠짐 (순서 보장 없음)
   */
  findByIdents(idents: string[]): Promise<Product[]>;

  /**
   * 저장 (insert 또는 update)
   * @returns 저장된 상품
   */
  save(product: Product): Promise<Product>;

  /**
   * 삭제
   */
  delete(ident: string): Promise<void>;

  /**
   * 계약번호 시퀀스 다음 값 (단조 증가)
   */
  nextSeriesId(): Promise<number>;

  /**
   * 종료일이 지난 상품 일괄 TERMINATED 전환
   * @returns 전환된 상품 수
   */
  terminateExpiredProducts(): Promise<number>;

  /**
   * 검색 조건으로 조회
   */
  findBySearchCriteria(criteria: SearchCriteria): Promise<Product[]>;
}
