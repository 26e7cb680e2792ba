/**
 * API v2 라우터
 */

import { Router } from "express";
import { ProductService } from "@/services/ProductService";
import { createProductsRouter } from "./products.router";

export function createV2Router(productService: ProductService): Router {
  const router = Router();

  router.use("/products", createProductsRouter(productService));

  return router;
}
