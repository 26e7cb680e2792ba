/**
 * Product 도메인 모델
 *
 * - 관계(ProductRelationship)는 대상 상품을 소유하지 않고 ident로만 참조
 * - 요청 검증용 Zod 스키마 포함
 */

import { z } from "zod";
import { ProductStatus } from "@/core/domain/ProductStatus";
import { PRODUCT_CONSTANTS } from "@/config/constants";

/**
 * 관계 대상 참조
 */
export interface ProductRef {
  ident: string;
  href?: string | null;
  name?: string | null;
}

/**
 * 상품 관계 (소유 상품 → 대상 상품)
 * relationshipType: "root" | "bundled" | 기타
 */
export interface ProductRelationship {
  relationshipType: string;
  productRef: ProductRef;
}

/**
 * 금액 (값은 소수 자릿수 보존을 위해 문자열)
 */
export interface Price {
  amountValue?: string | null;
  amountUnit?: string | null;
}

/**
 * 상품 가격
 * priceType: "OTC" (일회성) | "MRC" (월 정기) | 기타
 */
export interface ProductPrice {
  priceType: string;
  name?: string | null;
  price?: Price | null;
}

/**
 * 상품
 */
export interface Product {
  /** 전역 고유 ID (UUID, 생성 후 불변) */
  ident: string;

  /** 리소스 URL (생성 시 1회 할당) */
  href?: string | null;

  name?: string | null;
  description?: string | null;
  status: ProductStatus;

  /** "root" | "bundled" | 기타 */
  baseType?: string | null;

  /** 루트 상품에만 할당 (GKP + 7자리) */
  contractNumber?: string | null;

  productRelationships: ProductRelationship[];
  productPrices: ProductPrice[];
  startDate?: Date | null;
  terminationDate?: Date | null;
}

/**
 * 생성 요청 상품 (ident, href, 계약번호는 서버에서 할당)
 */
export type ProductDraft = Omit<
  Product,
  "ident" | "href" | "contractNumber" | "status"
> & {
  status?: ProductStatus | null;
};

export function isRootProduct(product: Pick<Product, "baseType">): boolean {
  return product.baseType === PRODUCT_CONSTANTS.ROOT;
}

export function toProductRef(product: Product): ProductRef {
  return {
    ident: product.ident,
    href: product.href ?? null,
    name: product.name ?? null,
  };
}

// ============================================
// Zod 스키마 (API 요청 검증)
// ============================================

const AmountValueSchema = z
  .union([z.string(), z.number().transform((value) => value.toString())])
  .nullish();

export const ProductRefSchema = z.object({
  ident: z.string().min(1),
  href: z.string().nullish(),
  name: z.string().nullish(),
});

export const ProductRelationshipSchema = z.object({
  relationshipType: z.string().min(1),
  productRef: ProductRefSchema,
});

export const ProductPriceSchema = z.object({
  priceType: z.string().min(1),
  name: z.string().nullish(),
  price: z
    .object({
      amountValue: AmountValueSchema,
      amountUnit: z.string().nullish(),
    })
    .nullish(),
});

export const ProductDraftSchema = z.object({
  name: z.string().nullish(),
  description: z.string().nullish(),
  status: z.nativeEnum(ProductStatus).nullish(),
  baseType: z.string().nullish(),
  productRelationships: z.array(ProductRelationshipSchema).default([]),
  productPrices: z.array(ProductPriceSchema).default([]),
  startDate: z.coerce.date().nullish(),
  terminationDate: z.coerce.date().nullish(),
});

export const ProductStatusChangeSchema = z.object({
  status: z.nativeEnum(ProductStatus),
});
