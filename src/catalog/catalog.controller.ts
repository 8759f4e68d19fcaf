import {
  Controller,
  Get,
  Param,
  Query,
  UsePipes,
  ValidationPipe,
} from "@nestjs/common";
import {
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiParam,
  ApiTags,
} from "@nestjs/swagger";
import { CatalogDocument, CatalogService } from "./catalog.service";
import {
  ListPricesQueryDto,
  ListProductsQueryDto,
  ListStocksQueryDto,
} from "./dto/list-catalog.query";

const storedDocument = {
  schema: { type: "object", additionalProperties: true },
};
const storedDocuments = {
  schema: {
    type: "array",
    items: { type: "object", additionalProperties: true },
  },
};

@ApiTags("Catalog")
@Controller("api/v1")
@UsePipes(new ValidationPipe({ whitelist: true, transform: true }))
export class CatalogController {
  constructor(private readonly catalog: CatalogService) {}

  // GET /api/v1/products?category=&brand=&limit=
  @Get("products")
  @ApiOkResponse(storedDocuments)
  listProducts(@Query() q: ListProductsQueryDto): Promise<CatalogDocument[]> {
    return this.catalog.list(
      "products",
      { category: q.category, brand: q.brand },
      q.limit,
    );
  }

  @Get("products/:productCode")
  @ApiParam({ name: "productCode" })
  @ApiOkResponse(storedDocument)
  @ApiNotFoundResponse({ description: "Product not found" })
  getProduct(@Param("productCode") code: string): Promise<CatalogDocument> {
    return this.catalog.findByProductCode("products", code);
  }

  // GET /api/v1/stocks?warehouse_id=&limit=
  @Get("stocks")
  @ApiOkResponse(storedDocuments)
  listStocks(@Query() q: ListStocksQueryDto): Promise<CatalogDocument[]> {
    return this.catalog.list("stocks", { warehouse_id: q.warehouse_id }, q.limit);
  }

  @Get("stocks/:productCode")
  @ApiParam({ name: "productCode" })
  @ApiOkResponse(storedDocument)
  @ApiNotFoundResponse({ description: "Stock not found" })
  getStock(@Param("productCode") code: string): Promise<CatalogDocument> {
    return this.catalog.findByProductCode("stocks", code);
  }

  // GET /api/v1/prices?currency=&limit=
  @Get("prices")
  @ApiOkResponse(storedDocuments)
  listPrices(@Query() q: ListPricesQueryDto): Promise<CatalogDocument[]> {
    return this.catalog.list("prices", { currency: q.currency }, q.limit);
  }

  @Get("prices/:productCode")
  @ApiParam({ name: "productCode" })
  @ApiOkResponse(storedDocument)
  @ApiNotFoundResponse({ description: "Price not found" })
  getPrice(@Param("productCode") code: string): Promise<CatalogDocument> {
    return this.catalog.findByProductCode("prices", code);
  }
}
