/**
 * 상품 CSV Export
 *
 * - 고정 6개 컬럼 헤더 + 입력 순서대로 상품당 1행
 * - 구분자 "," / 따옴표 이스케이프 없음 (값에 구분자가 없다고 가정)
 * - 각 행은 플랫폼 개행 문자로 종료
 */

import { EOL } from "os";
import { Product, ProductPrice } from "@/core/domain/Product";
import { CSV_CONFIG, PRODUCT_CONSTANTS } from "@/config/constants";
import { formatDottedDate } from "@/utils/timestamp";
import { formatPeriod, periodBetween } from "@/utils/CalendarPeriod";

export class ProductCsvExporter {
  /**
   * 상품 목록 → CSV 바이트
   */
  export(products: readonly Product[]): Buffer {
    const lines = [
      CSV_CONFIG.HEADERS.join(CSV_CONFIG.DELIMITER),
      ...products.map((product) => this.toRow(product)),
    ];
    return Buffer.from(lines.map((line) => line + EOL).join(""), "utf8");
  }

  toRow(product: Product): string {
    return [
      product.name ?? "",
      product.contractNumber ?? "",
      this.formatCharge(product.productPrices, PRODUCT_CONSTANTS.PRICE_TYPE_OTC),
      this.formatCharge(product.productPrices, PRODUCT_CONSTANTS.PRICE_TYPE_MRC),
      this.formatStartDate(product),
      this.formatDuration(product),
    ].join(CSV_CONFIG.DELIMITER);
  }

  /**
   * 첫 번째로 일치하는 priceType의 금액 + 단위
   */
  private formatCharge(prices: readonly ProductPrice[], priceType: string): string {
    const price = prices.find((entry) => entry.priceType === priceType)?.price;
    if (!price) {
      return "";
    }
    return (price.amountValue ?? "") + (price.amountUnit ?? "");
  }

  private formatStartDate(product: Product): string {
    return product.startDate ? formatDottedDate(product.startDate) : "";
  }

  private formatDuration(product: Product): string {
    if (!product.startDate || !product.terminationDate) {
      return "";
    }
    return formatPeriod(periodBetween(product.startDate, product.terminationDate));
  }
}
