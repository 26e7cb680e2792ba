/**
 * ProductService 테스트 (InMemoryProductStore 사용)
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import pino from "pino";
import { ProductService } from "@/services/ProductService";
import { ProductStatus } from "@/core/domain/ProductStatus";
import {
  CyclicRelationshipDetectedError,
  InvalidProductDeleteStatusError,
  InvalidProductInitialStatusError,
  InvalidStatusTransitionError,
  ProductNotFoundError,
  ProductsNotFoundError,
} from "@/core/interfaces/ProductErrorType";
import { InMemoryProductStore } from "../helpers/InMemoryProductStore";
import {
  buildProduct,
  bundled,
  rootOf,
  rootTargets,
} from "../helpers/productFixtures";

const mockLogger = pino({ level: "silent" });

const HREF_OPTIONS = {
  hrefBasePath: "http://localhost:3000",
  hrefProductPath: "/api/v2/products",
};

function createService(store: InMemoryProductStore): ProductService {
  return new ProductService(store, store, HREF_OPTIONS, {
    logger: mockLogger,
    generateIdent: () => "new-ident",
  });
}

describe("ProductService", () => {
  describe("insert", () => {
    it("루트 상품: 계약번호 할당 + 하위 트리에 루트 관계 전파", async () => {
      // A ─bundled→ C (C는 요청에 포함되지 않아 저장소에서 조회)
      const a = buildProduct("A", { productRelationships: [bundled("C")] });
      const b = buildProduct("B");
      const c = buildProduct("C");
      const store = new InMemoryProductStore([a, b, c], { seriesStart: 41 });
      const service = createService(store);

      const saved = await service.insert(
        {
          name: "Office Bundle",
          baseType: "root",
          productRelationships: [bundled("A"), bundled("B")],
          productPrices: [],
        },
        [a, b],
      );

      expect(saved.ident).toBe("new-ident");
      expect(saved.href).toBe("http://localhost:3000/api/v2/products/new-ident");
      expect(saved.contractNumber).toBe("GKP0000042");
      expect(saved.status).toBe(ProductStatus.CREATED);
      expect(saved.productRelationships).toEqual([
        {
          relationshipType: "bundled",
          productRef: {
            ident: "A",
            href: "http://test.local/products/A",
            name: "Product A",
          },
        },
        {
          relationshipType: "bundled",
          productRef: {
            ident: "B",
            href: "http://test.local/products/B",
            name: "Product B",
          },
        },
      ]);

      expect(store.calls).toEqual([
        "save:new-ident",
        "save:A",
        "save:C",
        "save:B",
      ]);
      ["A", "B", "C"].forEach((ident) => {
        const product = store.products.get(ident);
        expect(product && rootTargets(product)).toEqual(["new-ident"]);
      });
    });

    it("비루트 상품: 계약번호 없음, 시퀀스 미사용", async () => {
      const store = new InMemoryProductStore([], { seriesStart: 7 });
      const service = createService(store);

      const saved = await service.insert(
        {
          name: "Router",
          baseType: "bundled",
          productRelationships: [],
          productPrices: [],
        },
        [],
      );

      expect(saved.contractNumber).toBeNull();
      expect(store.calls).toEqual(["save:new-ident"]);
      expect(await store.nextSeriesId()).toBe(8);
    });

    it("CREATED 이외의 초기 상태는 거부", async () => {
      const store = new InMemoryProductStore();
      const service = createService(store);

      await expect(
        service.insert(
          {
            name: "Active",
            status: ProductStatus.ACTIVE,
            productRelationships: [],
            productPrices: [],
          },
          [],
        ),
      ).rejects.toThrow(InvalidProductInitialStatusError);
      expect(store.calls).toEqual([]);
    });

    it("참조 상품이 working set에 없으면 ProductsNotFoundError", async () => {
      const a = buildProduct("A");
      const store = new InMemoryProductStore([a]);
      const service = createService(store);

      await expect(
        service.insert(
          {
            name: "Bundle",
            baseType: "bundled",
            productRelationships: [bundled("A"), bundled("X")],
            productPrices: [],
          },
          [a],
        ),
      ).rejects.toThrow(ProductsNotFoundError);
      expect(store.calls).toEqual([]);
    });
  });

  describe("storeProduct", () => {
    it("순환이 있으면 아무것도 저장하지 않음", async () => {
      const a = buildProduct("A", { productRelationships: [bundled("R")] });
      const root = buildProduct("R", {
        baseType: "root",
        productRelationships: [bundled("A")],
      });
      const store = new InMemoryProductStore([a, root]);
      const service = createService(store);

      await expect(service.storeProduct(root, [a])).rejects.toThrow(
        CyclicRelationshipDetectedError,
      );
      expect(store.calls).toEqual([]);
    });

    it("이미 루트 관계가 있는 하위 상품은 다시 저장하지 않음", async () => {
      const a = buildProduct("A", { productRelationships: [rootOf("R")] });
      const root = buildProduct("R", {
        baseType: "root",
        productRelationships: [bundled("A")],
      });
      const store = new InMemoryProductStore([a, root]);
      const service = createService(store);

      await service.storeProduct(root, [a]);

      expect(store.calls).toEqual(["save:R"]);
    });
  });

  describe("updateProduct", () => {
    it("ident, href, 계약번호는 유지", async () => {
      const existing = buildProduct("E", {
        baseType: "root",
        contractNumber: "GKP0000003",
        status: ProductStatus.ACTIVE,
      });
      const store = new InMemoryProductStore([existing]);
      const service = createService(store);

      const saved = await service.updateProduct(
        "E",
        {
          name: "Renamed",
          baseType: "root",
          status: ProductStatus.PENDINGTERMINATE,
          productRelationships: [],
          productPrices: [],
        },
        [],
      );

      expect(saved.ident).toBe("E");
      expect(saved.href).toBe("http://test.local/products/E");
      expect(saved.contractNumber).toBe("GKP0000003");
      expect(saved.name).toBe("Renamed");
      expect(saved.status).toBe(ProductStatus.PENDINGTERMINATE);
    });

    it("루트에서 비루트로 바뀌면 계약번호 제거", async () => {
      const store = new InMemoryProductStore([
        buildProduct("E", { baseType: "root", contractNumber: "GKP0000003" }),
      ]);
      const service = createService(store);

      const saved = await service.updateProduct(
        "E",
        { baseType: "bundled", productRelationships: [], productPrices: [] },
        [],
      );

      expect(saved.baseType).toBe("bundled");
      expect(saved.contractNumber).toBeNull();
    });

    it("비루트에서 루트로 바뀌면 계약번호 신규 할당", async () => {
      const store = new InMemoryProductStore([buildProduct("E")], {
        seriesStart: 9,
      });
      const service = createService(store);

      const saved = await service.updateProduct(
        "E",
        { baseType: "root", productRelationships: [], productPrices: [] },
        [],
      );

      expect(saved.baseType).toBe("root");
      expect(saved.contractNumber).toBe("GKP0000010");
    });

    it("허용되지 않은 상태 전이는 거부", async () => {
      const store = new InMemoryProductStore([
        buildProduct("E", { status: ProductStatus.ABORTED }),
      ]);
      const service = createService(store);

      await expect(
        service.updateProduct(
          "E",
          {
            status: ProductStatus.ACTIVE,
            productRelationships: [],
            productPrices: [],
          },
          [],
        ),
      ).rejects.toThrow(InvalidStatusTransitionError);
      expect(store.calls).toEqual([]);
    });
  });

  describe("changeStatus", () => {
    let store: InMemoryProductStore;
    let service: ProductService;

    beforeEach(() => {
      store = new InMemoryProductStore([
        buildProduct("A", { status: ProductStatus.ACTIVE }),
        buildProduct("N", { status: ProductStatus.CREATED }),
      ]);
      service = createService(store);
    });

    it("허용된 전이는 저장", async () => {
      const saved = await service.changeStatus("A", ProductStatus.TERMINATED);

      expect(saved.status).toBe(ProductStatus.TERMINATED);
      expect(store.calls).toEqual(["save:A"]);
    });

    it("같은 상태면 저장하지 않음", async () => {
      const result = await service.changeStatus("A", ProductStatus.ACTIVE);

      expect(result.status).toBe(ProductStatus.ACTIVE);
      expect(store.calls).toEqual([]);
    });

    it("허용되지 않은 전이는 InvalidStatusTransitionError", async () => {
      await expect(
        service.changeStatus("N", ProductStatus.TERMINATED),
      ).rejects.toThrow(InvalidStatusTransitionError);
      expect(store.calls).toEqual([]);
    });

    it("없는 상품은 ProductNotFoundError", async () => {
      await expect(
        service.changeStatus("missing", ProductStatus.ACTIVE),
      ).rejects.toThrow(ProductNotFoundError);
    });
  });

  describe("validateStatusTransition / allowedTransitions", () => {
    const service = createService(new InMemoryProductStore());

    it("허용된 전이와 self-loop는 통과", () => {
      expect(() =>
        service.validateStatusTransition(
          ProductStatus.ACTIVE,
          ProductStatus.PENDINGTERMINATE,
        ),
      ).not.toThrow();
      expect(() =>
        service.validateStatusTransition(
          ProductStatus.ABORTED,
          ProductStatus.ABORTED,
        ),
      ).not.toThrow();
    });

    it("허용되지 않은 전이는 InvalidStatusTransitionError", () => {
      expect(() =>
        service.validateStatusTransition(
          ProductStatus.TERMINATED,
          ProductStatus.CREATED,
        ),
      ).toThrow(InvalidStatusTransitionError);
    });

    it("전이 가능 상태 목록", () => {
      expect(service.allowedTransitions(ProductStatus.CREATED)).toEqual([
        ProductStatus.ACTIVE,
        ProductStatus.ABORTED,
      ]);
    });
  });

  describe("getProductsByIdents", () => {
    it("요청 순서대로 반환, 중복 ident는 1회", async () => {
      const store = new InMemoryProductStore([
        buildProduct("A"),
        buildProduct("B"),
      ]);
      const service = createService(store);

      const products = await service.getProductsByIdents(["B", "A", "B"]);

      expect(products.map((product) => product.ident)).toEqual(["B", "A"]);
    });

    it("누락된 ident를 모두 보고", async () => {
      const store = new InMemoryProductStore([
        buildProduct("A"),
        buildProduct("C"),
      ]);
      const service = createService(store);

      try {
        await service.getProductsByIdents(["A", "B", "C"]);
        throw new Error("expected getProductsByIdents to throw");
      } catch (error) {
        expect(error).toBeInstanceOf(ProductsNotFoundError);
        if (error instanceof ProductsNotFoundError) {
          expect(error.missingIdents).toEqual(["B"]);
        }
      }
    });
  });

  describe("getReferencedProducts", () => {
    it("관계 대상 상품 조회", async () => {
      const store = new InMemoryProductStore([
        buildProduct("A"),
        buildProduct("R"),
      ]);
      const service = createService(store);

      const products = await service.getReferencedProducts([
        bundled("A"),
        rootOf("R"),
      ]);

      expect(products.map((product) => product.ident)).toEqual(["A", "R"]);
    });
  });

  describe("deleteProduct", () => {
    // R ─bundled→ A ─bundled→ B
    const buildStore = (rootStatus: ProductStatus) =>
      new InMemoryProductStore([
        buildProduct("R", {
          baseType: "root",
          status: rootStatus,
          productRelationships: [bundled("A")],
        }),
        buildProduct("A", {
          productRelationships: [rootOf("R"), bundled("B")],
        }),
        buildProduct("B", { productRelationships: [rootOf("R")] }),
      ]);

    it("bundled 하위 트리를 자식 먼저 삭제", async () => {
      const store = buildStore(ProductStatus.TERMINATED);
      const service = createService(store);

      const deleted = await service.deleteProduct("R");

      expect(deleted).toEqual(["B", "A", "R"]);
      expect(store.calls).toEqual([
        "unlink:bundled:A",
        "unlink:bundled:B",
        "delete:B",
        "delete:A",
        "delete:R",
      ]);
      expect(store.products.size).toBe(0);
    });

    it("TERMINATED가 아니면 아무것도 삭제하지 않음", async () => {
      const store = buildStore(ProductStatus.ACTIVE);
      const service = createService(store);

      await expect(service.deleteProduct("R")).rejects.toThrow(
        InvalidProductDeleteStatusError,
      );
      expect(store.calls).toEqual([]);
      expect(store.products.size).toBe(3);
    });

    it("TERMINATED가 아니면 하위 트리를 조회하기 전에 거부", async () => {
      const store = new InMemoryProductStore([
        buildProduct("R", {
          baseType: "root",
          status: ProductStatus.ACTIVE,
          productRelationships: [bundled("GONE")],
        }),
      ]);
      const service = createService(store);

      await expect(service.deleteProduct("R")).rejects.toThrow(
        InvalidProductDeleteStatusError,
      );
      expect(store.calls).toEqual([]);
    });

    it("하위 상품 삭제 시 상위 상품의 bundled 관계 제거", async () => {
      const store = new InMemoryProductStore([
        buildProduct("R", {
          baseType: "root",
          productRelationships: [bundled("A"), bundled("B")],
        }),
        buildProduct("A", { status: ProductStatus.TERMINATED }),
        buildProduct("B"),
      ]);
      const service = createService(store);

      await service.deleteProduct("A");

      expect(store.products.get("R")?.productRelationships).toEqual([
        bundled("B"),
      ]);
    });

    it("없는 상품은 ProductNotFoundError", async () => {
      const service = createService(new InMemoryProductStore());

      await expect(service.deleteProduct("missing")).rejects.toThrow(
        ProductNotFoundError,
      );
    });
  });

  describe("searchProduct", () => {
    it("조건에 맞는 상품만 반환", async () => {
      const store = new InMemoryProductStore([
        buildProduct("A", { name: "Voice Plan", status: ProductStatus.ACTIVE }),
        buildProduct("B", { name: "Data Plan", status: ProductStatus.CREATED }),
        buildProduct("C", { name: "Voice Extra", status: ProductStatus.CREATED }),
      ]);
      const service = createService(store);

      const products = await service.searchProduct({
        name: "voice",
        status: ProductStatus.CREATED,
        limit: 10,
      });

      expect(products.map((product) => product.ident)).toEqual(["C"]);
    });
  });

  describe("exportProduct", () => {
    it("요청 순서대로 CSV 행 생성", async () => {
      const store = new InMemoryProductStore([
        buildProduct("A", { name: "First" }),
        buildProduct("B", { name: "Second" }),
      ]);
      const service = createService(store);

      const csv = (await service.exportProduct(["B", "A"])).toString("utf8");

      expect(csv.split(/\r?\n/)).toEqual([
        "Product name,Contract number,One time charge,Monthly recurring charge,Start date,Duration",
        "Second,,,,,",
        "First,,,,,",
        "",
      ]);
    });

    it("없는 상품이 있으면 ProductsNotFoundError", async () => {
      const service = createService(
        new InMemoryProductStore([buildProduct("A")]),
      );

      await expect(service.exportProduct(["A", "Z"])).rejects.toThrow(
        ProductsNotFoundError,
      );
    });
  });

  describe("terminateExpiredProducts", () => {
    it("만료된 ACTIVE/PENDINGTERMINATE 상품만 종료", async () => {
      const expired = new Date("2024-05-01T00:00:00.000Z");
      const store = new InMemoryProductStore(
        [
          buildProduct("A", {
            status: ProductStatus.ACTIVE,
            terminationDate: expired,
          }),
          buildProduct("P", {
            status: ProductStatus.PENDINGTERMINATE,
            terminationDate: expired,
          }),
          buildProduct("C", {
            status: ProductStatus.CREATED,
            terminationDate: expired,
          }),
          buildProduct("F", {
            status: ProductStatus.ACTIVE,
            terminationDate: new Date("2024-12-01T00:00:00.000Z"),
          }),
        ],
        { now: new Date("2024-06-01T00:00:00.000Z") },
      );
      const service = createService(store);

      const terminated = await service.terminateExpiredProducts();

      expect(terminated).toBe(2);
      expect(store.products.get("A")?.status).toBe(ProductStatus.TERMINATED);
      expect(store.products.get("P")?.status).toBe(ProductStatus.TERMINATED);
      expect(store.products.get("C")?.status).toBe(ProductStatus.CREATED);
      expect(store.products.get("F")?.status).toBe(ProductStatus.ACTIVE);
    });
  });
});
