/**
 * Supabase Product Relationship Repository 구현
 *
 * 관계는 소유 상품 행의 product_relationships(jsonb) 컬럼에 저장되므로,
 * 관계 삭제 = 해당 관계를 가진 소유 상품 행의 컬럼 갱신
 */

import { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { IProductRelationshipRepository } from "@/core/interfaces/IProductRelationshipRepository";
import { ProductRelationshipRowSchema } from "@/mappers/ProductMapper";
import { DATABASE_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import { getSupabaseClient } from "@/repositories/SupabaseClientFactory";

const OwnerRowSchema = z.object({
  ident: z.string(),
  product_relationships: z.array(ProductRelationshipRowSchema).nullish(),
});

export class SupabaseProductRelationshipRepository
  implements IProductRelationshipRepository
{
  private readonly client: SupabaseClient;
  private readonly tableName = DATABASE_CONFIG.PRODUCT_TABLE_NAME;

  constructor(client?: SupabaseClient) {
    this.client = client ?? getSupabaseClient();
  }

  async deleteByTypeAndProductRef(
    relationshipType: string,
    refIdent: string,
  ): Promise<void> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select("ident, product_relationships")
      .contains("product_relationships", [
        { relationship_type: relationshipType, product_ref: { ident: refIdent } },
      ]);

    if (error) {
      logger.error(
        { error: error.message, code: error.code, relationshipType, refIdent },
        "[RelationshipRepository] 관계 소유 상품 조회 실패",
      );
      throw new Error(`Supabase query failed: ${error.message}`);
    }

    const owners = z.array(OwnerRowSchema).parse(data ?? []);

    for (const owner of owners) {
      const remaining = (owner.product_relationships ?? []).filter(
        (relationship) =>
          !(
            relationship.relationship_type === relationshipType &&
            relationship.product_ref.ident === refIdent
          ),
      );

      const { error: updateError } = await this.client
        .from(this.tableName)
        .update({ product_relationships: remaining })
        .eq("ident", owner.ident);

      if (updateError) {
        logger.error(
          { error: updateError.message, owner: owner.ident, refIdent },
          "[RelationshipRepository] 관계 삭제 실패",
        );
        throw new Error(`Supabase update failed: ${updateError.message}`);
      }
    }

    logger.debug(
      { relationshipType, refIdent, owners: owners.length },
      "[RelationshipRepository] 관계 삭제 완료",
    );
  }
}
