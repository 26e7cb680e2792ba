/**
 * Product Mapper
 *
 * products 테이블 행(snake_case) ↔ Product 도메인(camelCase) 변환
 *
 * 테이블 구조:
 * - product_relationships: jsonb 배열 [{ relationship_type, product_ref: { ident, href, name } }]
 * - product_prices: jsonb 배열 [{ price_type, name, price: { amount_value, amount_unit } }]
 * - start_date / termination_date: timestamptz (ISO 문자열)
 */

import { z } from "zod";
import { Product } from "@/core/domain/Product";
import { ProductStatus } from "@/core/domain/ProductStatus";

/**
 * 빈 문자열을 null로 변환하는 전처리기
 */
const emptyToNull = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((val) => (val === "" ? null : val), schema);

export const ProductRelationshipRowSchema = z.object({
  relationship_type: z.string(),
  product_ref: z.object({
    ident: z.string(),
    href: z.string().nullish(),
    name: z.string().nullish(),
  }),
});

export const ProductPriceRowSchema = z.object({
  price_type: z.string(),
  name: z.string().nullish(),
  price: z
    .object({
      amount_value: z
        .union([z.string(), z.number().transform((value) => value.toString())])
        .nullish(),
      amount_unit: z.string().nullish(),
    })
    .nullish(),
});

export const ProductRowSchema = z.object({
  ident: z.string(),
  href: emptyToNull(z.string().nullish()),
  name: emptyToNull(z.string().nullish()),
  description: emptyToNull(z.string().nullish()),
  status: z.nativeEnum(ProductStatus),
  base_type: emptyToNull(z.string().nullish()),
  contract_number: emptyToNull(z.string().nullish()),
  product_relationships: z.array(ProductRelationshipRowSchema).nullish(),
  product_prices: z.array(ProductPriceRowSchema).nullish(),
  start_date: emptyToNull(z.string().nullish()),
  termination_date: emptyToNull(z.string().nullish()),
});

export type ProductRelationshipRow = z.infer<typeof ProductRelationshipRowSchema>;
export type ProductRow = z.infer<typeof ProductRowSchema>;

function toDate(value: string | null | undefined): Date | null {
  return value ? new Date(value) : null;
}

export class ProductMapper {
  /**
   * DB 행 → 도메인 (검증 포함)
   * @throws ZodError 행 구조가 스키마와 다름
   */
  static toDomain(raw: unknown): Product {
    const row = ProductRowSchema.parse(raw);

    return {
      ident: row.ident,
      href: row.href ?? null,
      name: row.name ?? null,
      description: row.description ?? null,
      status: row.status,
      baseType: row.base_type ?? null,
      contractNumber: row.contract_number ?? null,
      productRelationships: (row.product_relationships ?? []).map(
        (relationship) => ({
          relationshipType: relationship.relationship_type,
          productRef: {
            ident: relationship.product_ref.ident,
            href: relationship.product_ref.href ?? null,
            name: relationship.product_ref.name ?? null,
          },
        }),
      ),
      productPrices: (row.product_prices ?? []).map((productPrice) => ({
        priceType: productPrice.price_type,
        name: productPrice.name ?? null,
        price: productPrice.price
          ? {
              amountValue: productPrice.price.amount_value ?? null,
              amountUnit: productPrice.price.amount_unit ?? null,
            }
          : null,
      })),
      startDate: toDate(row.start_date),
      terminationDate: toDate(row.termination_date),
    };
  }

  /**
   * 도메인 → DB 행
   */
  static toRow(product: Product): ProductRow {
    return {
      ident: product.ident,
      href: product.href ?? null,
      name: product.name ?? null,
      description: product.description ?? null,
      status: product.status,
      base_type: product.baseType ?? null,
      contract_number: product.contractNumber ?? null,
      product_relationships: product.productRelationships.map((relationship) => ({
        relationship_type: relationship.relationshipType,
        product_ref: {
          ident: relationship.productRef.ident,
          href: relationship.productRef.href ?? null,
          name: relationship.productRef.name ?? null,
        },
      })),
      product_prices: product.productPrices.map((productPrice) => ({
        price_type: productPrice.priceType,
        name: productPrice.name ?? null,
        price: productPrice.price
          ? {
              amount_value: productPrice.price.amountValue ?? null,
              amount_unit: productPrice.price.amountUnit ?? null,
            }
          : null,
      })),
      start_date: product.startDate ? product.startDate.toISOString() : null,
      termination_date: product.terminationDate
        ? product.terminationDate.toISOString()
        : null,
    };
  }
}
