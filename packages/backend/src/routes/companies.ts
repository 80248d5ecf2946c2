import { Router } from "express";
import { z } from "zod";
import type { BatchIngestResponse, Company } from "@supplygraph/shared";
import { NotFoundError } from "../errors.js";
import { parseWith } from "../middleware/validator.js";
import { resolveRouterDependencies, type AnalyticsRouterOptions } from "./options.js";

const nameParamsSchema = z.object({
  name: z.string().min(1)
});

const permidParamsSchema = z.object({
  permid: z.coerce.number().int().positive()
});

const sectorParamsSchema = z.object({
  sector: z.string().min(1)
});

const countryParamsSchema = z.object({
  country: z.string().min(1)
});

const listQuerySchema = z.object({
  minMatchScore: z.coerce.number().optional()
});

const companyInputSchema = z.object({
  permid: z.number().int(),
  name: z.string(),
  isFinalAssembler: z.boolean().optional(),
  matchScore: z.number().optional(),
  industrySector: z.string().optional(),
  country: z.string().optional(),
  marketCap: z.number().optional(),
  revenue: z.number().optional()
});

const batchBodySchema = z.array(companyInputSchema);

function found(company: Company | null, description: string): Company {
  if (!company) {
    throw new NotFoundError(`Company not found: ${description}`);
  }
  return company;
}

export function createCompaniesRouter(options: AnalyticsRouterOptions = {}): Router {
  const { service, storeReady } = resolveRouterDependencies(options);
  const companiesRouter = Router();
  companiesRouter.use(storeReady);

  companiesRouter.get("/", async (req, res) => {
    const { minMatchScore } = parseWith(listQuerySchema, req.query);
    res.json(await service.getHighConfidenceCompanies(minMatchScore));
  });

  companiesRouter.post("/batch", async (req, res) => {
    const companies = parseWith(batchBodySchema, req.body, "Invalid company batch");
    const count = await service.batchIngestCompanies(companies);
    const response: BatchIngestResponse = {
      count,
      message: "Successfully ingested companies"
    };
    res.json(response);
  });

  companiesRouter.get("/permid/:permid", async (req, res) => {
    const { permid } = parseWith(permidParamsSchema, req.params);
    res.json(found(await service.findCompanyByPermid(permid), `permid ${permid}`));
  });

  companiesRouter.get("/sector/:sector", async (req, res) => {
    const { sector } = parseWith(sectorParamsSchema, req.params);
    res.json(await service.findCompaniesBySector(sector));
  });

  companiesRouter.get("/country/:country", async (req, res) => {
    const { country } = parseWith(countryParamsSchema, req.params);
    res.json(await service.findCompaniesByCountry(country));
  });

  companiesRouter.get("/:name", async (req, res) => {
    const { name } = parseWith(nameParamsSchema, req.params);
    res.json(found(await service.findCompanyByName(name), name));
  });

  return companiesRouter;
}
