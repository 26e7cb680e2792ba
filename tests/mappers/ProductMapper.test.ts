/**
 * ProductMapper 테스트
 */

import { describe, it, expect } from "@jest/globals";
import { ZodError } from "zod";
import { ProductMapper } from "@/mappers/ProductMapper";
import { ProductStatus } from "@/core/domain/ProductStatus";
import { buildProduct } from "../helpers/productFixtures";

describe("ProductMapper", () => {
  describe("toDomain", () => {
    it("snake_case 행 → 도메인", () => {
      const product = ProductMapper.toDomain({
        ident: "P1",
        href: "http://localhost:3000/api/v2/products/P1",
        name: "Voice Plan",
        description: "",
        status: "ACTIVE",
        base_type: "root",
        contract_number: "GKP0000001",
        product_relationships: [
          {
            relationship_type: "bundled",
            product_ref: { ident: "C1", name: "SIM" },
          },
        ],
        product_prices: [
          {
            price_type: "MRC",
            name: "Monthly",
            price: { amount_value: 5, amount_unit: "EUR" },
          },
        ],
        start_date: "2023-01-15T00:00:00+00:00",
        termination_date: null,
      });

      expect(product).toEqual({
        ident: "P1",
        href: "http://localhost:3000/api/v2/products/P1",
        name: "Voice Plan",
        description: null,
        status: ProductStatus.ACTIVE,
        baseType: "root",
        contractNumber: "GKP0000001",
        productRelationships: [
          {
            relationshipType: "bundled",
            productRef: { ident: "C1", href: null, name: "SIM" },
          },
        ],
        productPrices: [
          {
            priceType: "MRC",
            name: "Monthly",
            price: { amountValue: "5", amountUnit: "EUR" },
          },
        ],
        startDate: new Date("2023-01-15T00:00:00.000Z"),
        terminationDate: null,
      });
    });

    it("jsonb 컬럼이 null이면 빈 배열", () => {
      const product = ProductMapper.toDomain({
        ident: "P2",
        status: "CREATED",
        product_relationships: null,
        product_prices: null,
      });

      expect(product.productRelationships).toEqual([]);
      expect(product.productPrices).toEqual([]);
      expect(product.startDate).toBeNull();
    });

    it("알 수 없는 상태 값은 ZodError", () => {
      expect(() =>
        ProductMapper.toDomain({ ident: "P3", status: "PAUSED" }),
      ).toThrow(ZodError);
    });
  });

  describe("toRow", () => {
    it("도메인 → snake_case 행", () => {
      const row = ProductMapper.toRow(
        buildProduct("P4", {
          productRelationships: [
            { relationshipType: "root", productRef: { ident: "R" } },
          ],
          productPrices: [
            { priceType: "OTC", price: { amountValue: "10.00", amountUnit: "EUR" } },
          ],
          startDate: new Date("2023-01-15T00:00:00.000Z"),
        }),
      );

      expect(row).toEqual({
        ident: "P4",
        href: "http://test.local/products/P4",
        name: "Product P4",
        description: null,
        status: "ACTIVE",
        base_type: "bundled",
        contract_number: null,
        product_relationships: [
          {
            relationship_type: "root",
            product_ref: { ident: "R", href: null, name: null },
          },
        ],
        product_prices: [
          {
            price_type: "OTC",
            name: null,
            price: { amount_value: "10.00", amount_unit: "EUR" },
          },
        ],
        start_date: "2023-01-15T00:00:00.000Z",
        termination_date: null,
      });
    });

    it("toRow → toDomain 결과가 원본과 같음", () => {
      const original = buildProduct("P5", {
        status: ProductStatus.PENDINGTERMINATE,
        terminationDate: new Date("2024-03-31T00:00:00.000Z"),
      });

      expect(ProductMapper.toDomain(ProductMapper.toRow(original))).toEqual(
        original,
      );
    });
  });
});
