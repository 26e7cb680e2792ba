/**
 * ProductService 생성 (Supabase 저장소 + 환경변수 href 설정)
 */

import { ProductService } from "@/services/ProductService";
import { SupabaseProductRepository } from "@/repositories/SupabaseProductRepository";
import { SupabaseProductRelationshipRepository } from "@/repositories/SupabaseProductRelationshipRepository";
import { HREF_CONFIG } from "@/config/constants";

export function createProductService(): ProductService {
  return new ProductService(
    new SupabaseProductRepository(),
    new SupabaseProductRelationshipRepository(),
    {
      hrefBasePath: HREF_CONFIG.BASE_PATH,
      hrefProductPath: HREF_CONFIG.PRODUCT_PATH,
    },
  );
}
