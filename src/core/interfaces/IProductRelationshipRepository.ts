/**
 * Product Relationship Repository 인터페이스
 */
export interface IProductRelationshipRepository {
  /**
   * 특정 타입의 관계 중 productRef가 refIdent인 관계를 모두 삭제
   * (삭제될 상품을 가리키는 다른 상품의 관계 정리용)
   */
  deleteByTypeAndProductRef(
    relationshipType: string,
    refIdent: string,
  ): Promise<void>;
}
