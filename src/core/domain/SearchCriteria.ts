/**
 * 상품 검색 조건
 *
 * - 모든 필드 선택 (조건 없으면 limit 만큼 전체 조회)
 * - name은 부분 일치 (대소문자 무시), 나머지는 완전 일치 / 범위
 */

import { z } from "zod";
import { ProductStatus } from "@/core/domain/ProductStatus";
import { REPOSITORY_CONFIG } from "@/config/constants";

export const SearchCriteriaSchema = z.object({
  status: z.nativeEnum(ProductStatus).optional(),
  baseType: z.string().min(1).optional(),
  name: z.string().min(1).optional(),
  contractNumber: z.string().min(1).optional(),
  startDateFrom: z.coerce.date().optional(),
  startDateTo: z.coerce.date().optional(),
  limit: z.coerce
    .number()
    .int()
    .positive()
    .max(REPOSITORY_CONFIG.MAX_SEARCH_LIMIT)
    .optional(),
});

export type SearchCriteria = z.infer<typeof SearchCriteriaSchema>;
