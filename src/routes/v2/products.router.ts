/**
 * Products API v2 라우터
 *
 * - POST   /api/v2/products                상품 생성
 * - POST   /api/v2/products/search         상품 검색
 * - GET    /api/v2/products/export?ids=    CSV 다운로드
 * - GET    /api/v2/products/:ident         상품 조회
 * - GET    /api/v2/products/:ident/transitions  전이 가능 상태 조회
 * - PUT    /api/v2/products/:ident         상품 갱신 (관계 재해석 + 루트 전파)
 * - PATCH  /api/v2/products/:ident/status  상태 변경
 * - DELETE /api/v2/products/:ident         연쇄 삭제 (TERMINATED만)
 *
 * 에러는 next()로 전달 → errorHandler에서 HTTP 상태 코드 매핑
 */

import { Router, Request, Response, NextFunction } from "express";
import {
  ProductDraftSchema,
  ProductStatusChangeSchema,
} from "@/core/domain/Product";
import { SearchCriteriaSchema } from "@/core/domain/SearchCriteria";
import { ProductService } from "@/services/ProductService";
import {
  parseIdList,
  validateExportQuery,
  validateIdentParam,
} from "@/middleware/validation";
import { getRequestId } from "@/middleware/requestLogger";
import { createRequestLogger } from "@/utils/LoggerContext";
import { CSV_CONFIG } from "@/config/constants";

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * async 핸들러 래퍼 (reject → next(error))
 */
function handle(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function createProductsRouter(service: ProductService): Router {
  const router = Router();

  /**
   * POST /api/v2/products
   *
   * Request Body: ProductDraft
   * Response: 201 + 생성된 상품
   */
  router.post(
    "/",
    handle(async (req, res) => {
      const draft = ProductDraftSchema.parse(req.body);
      const referenced = await service.getReferencedProducts(
        draft.productRelationships,
      );
      const product = await service.insert(draft, referenced);

      createRequestLogger(getRequestId(req), req.method, req.path).info(
        { ident: product.ident },
        "상품 생성 완료",
      );

      res.status(201).json(product);
    }),
  );

  /**
   * POST /api/v2/products/search
   *
   * Request Body: SearchCriteria
   */
  router.post(
    "/search",
    handle(async (req, res) => {
      const criteria = SearchCriteriaSchema.parse(req.body ?? {});
      const products = await service.searchProduct(criteria);
      res.status(200).json(products);
    }),
  );

  /**
   * GET /api/v2/products/export?ids=<ident>,<ident>
   *
   * Response: text/csv 첨부 파일
   */
  router.get(
    "/export",
    validateExportQuery,
    handle(async (req, res) => {
      const ids = typeof req.query.ids === "string" ? parseIdList(req.query.ids) : [];
      const csv = await service.exportProduct(ids);

      res.setHeader("Content-Type", "text/csv; charset=utf-8");
      res.setHeader(
        "Content-Disposition",
        `attachment; filename=${CSV_CONFIG.FILE_NAME}`,
      );
      res.status(200).send(csv);
    }),
  );

  router.get(
    "/:ident",
    validateIdentParam,
    handle(async (req, res) => {
      const product = await service.getProductByIdent(req.params.ident);
      res.status(200).json(product);
    }),
  );

  /**
   * GET /api/v2/products/:ident/transitions
   *
   * Response: { ident, status, allowedTransitions }
   */
  router.get(
    "/:ident/transitions",
    validateIdentParam,
    handle(async (req, res) => {
      const product = await service.getProductByIdent(req.params.ident);
      res.status(200).json({
        ident: product.ident,
        status: product.status,
        allowedTransitions: service.allowedTransitions(product.status),
      });
    }),
  );

  /**
   * PUT /api/v2/products/:ident
   *
   * Request Body: ProductDraft (status 포함 시 전이 검증)
   */
  router.put(
    "/:ident",
    validateIdentParam,
    handle(async (req, res) => {
      const update = ProductDraftSchema.parse(req.body);
      const referenced = await service.getReferencedProducts(
        update.productRelationships,
      );
      const product = await service.updateProduct(
        req.params.ident,
        update,
        referenced,
      );
      res.status(200).json(product);
    }),
  );

  /**
   * PATCH /api/v2/products/:ident/status
   *
   * Request Body: { "status": "ACTIVE" }
   */
  router.patch(
    "/:ident/status",
    validateIdentParam,
    handle(async (req, res) => {
      const { status } = ProductStatusChangeSchema.parse(req.body);
      const product = await service.changeStatus(req.params.ident, status);
      res.status(200).json(product);
    }),
  );

  /**
   * DELETE /api/v2/products/:ident
   *
   * Response: 204 (bundled 하위 상품 포함 삭제)
   */
  router.delete(
    "/:ident",
    validateIdentParam,
    handle(async (req, res) => {
      const deleted = await service.deleteProduct(req.params.ident);

      createRequestLogger(getRequestId(req), req.method, req.path).info(
        { deleted },
        "상품 연쇄 삭제 완료",
      );

      res.status(204).send();
    }),
  );

  return router;
}
