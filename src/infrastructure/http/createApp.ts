import cors from 'cors';
import express, { type ErrorRequestHandler, type Response } from 'express';
import multer from 'multer';
import type { ZodError } from 'zod';
import {
  DateRangeSchema,
  DebtPayoffQuerySchema,
  MonthlySummaryQuerySchema,
  SpendingTrendsQuerySchema,
  TopMerchantsQuerySchema,
} from '../../application/dto/AnalyticsDTO.js';
import {
  BalanceFilterSchema,
  TaxDocumentFilterSchema,
  TransactionFilterSchema,
} from '../../application/dto/RecordQueryDTO.js';
import { describeError } from '../../application/errors/IngestionErrors.js';
import type { AppContainer } from '../bootstrap/AppContainer.js';

const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

const badRequest = (res: Response, error: ZodError): void => {
  res.status(400).json({ error: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ') });
};

const parseFlag = (value: unknown): boolean => value === true || value === 'true' || value === '1';

export const createApp = (container: AppContainer): express.Express => {
  const app = express();
  const { batchImportService, recordQueryService, spendingAnalyticsService, debtPayoffService, reader, logger } = container;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: MAX_UPLOAD_BYTES,
    },
    fileFilter: (req, file, cb) => {
      if (reader.isSupported(file.originalname)) {
        cb(null, true);
      } else {
        cb(new Error(`Unsupported file type. Allowed: ${reader.supportedExtensions.join(', ')}`));
      }
    },
  });

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '2mb' }));

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'ledger-ingest',
      version: '0.1.0',
      status: 'ok',
    });
  });

  app.post('/api/ingest', upload.single('document'), async (req, res) => {
    if (!req.file) {
      res.status(400).json({ error: 'No document provided. Upload it in the "document" field.' });
      return;
    }

    try {
      const outcome = await batchImportService.importUpload(
        { fileName: req.file.originalname, content: req.file.buffer },
        { forceReimport: parseFlag(req.body?.forceReimport) || parseFlag(req.query.forceReimport) },
      );
      res.status(outcome.status === 'failed' ? 422 : 200).json(outcome);
    } catch (error) {
      logger.error('Upload ingestion error', { fileName: req.file.originalname, error });
      res.status(500).json({ error: describeError(error) });
    }
  });

  app.get('/api/transactions', (req, res) => {
    const filter = TransactionFilterSchema.safeParse(req.query);
    if (!filter.success) {
      badRequest(res, filter.error);
      return;
    }
    res.json(recordQueryService.listTransactions(filter.data));
  });

  app.get('/api/balances', (req, res) => {
    const filter = BalanceFilterSchema.safeParse(req.query);
    if (!filter.success) {
      badRequest(res, filter.error);
      return;
    }
    res.json(recordQueryService.listBalances(filter.data));
  });

  app.get('/api/balances/latest', (req, res) => {
    res.json(recordQueryService.listLatestBalances());
  });

  app.get('/api/paystubs', (req, res) => {
    res.json(recordQueryService.listPaystubs());
  });

  app.get('/api/tax-documents', (req, res) => {
    const filter = TaxDocumentFilterSchema.safeParse(req.query);
    if (!filter.success) {
      badRequest(res, filter.error);
      return;
    }
    res.json(recordQueryService.listTaxDocuments(filter.data.taxYear));
  });

  app.get('/api/investments', (req, res) => {
    res.json(recordQueryService.listInvestmentAccounts());
  });

  app.get('/api/imports', (req, res) => {
    res.json(recordQueryService.listImportedFiles());
  });

  app.get('/api/statistics', (req, res) => {
    res.json(recordQueryService.getStatistics());
  });

  app.get('/api/analytics/monthly', (req, res) => {
    const query = MonthlySummaryQuerySchema.safeParse(req.query);
    if (!query.success) {
      badRequest(res, query.error);
      return;
    }
    res.json(spendingAnalyticsService.monthlySummary(query.data.year));
  });

  app.get('/api/analytics/categories', (req, res) => {
    const range = DateRangeSchema.safeParse(req.query);
    if (!range.success) {
      badRequest(res, range.error);
      return;
    }
    res.json(spendingAnalyticsService.categoryBreakdown(range.data));
  });

  app.get('/api/analytics/merchants', (req, res) => {
    const query = TopMerchantsQuerySchema.safeParse(req.query);
    if (!query.success) {
      badRequest(res, query.error);
      return;
    }
    const { limit, ...range } = query.data;
    res.json(spendingAnalyticsService.topMerchants(limit, range));
  });

  app.get('/api/analytics/trends', (req, res) => {
    const query = SpendingTrendsQuerySchema.safeParse(req.query);
    if (!query.success) {
      badRequest(res, query.error);
      return;
    }
    res.json(spendingAnalyticsService.spendingTrends(query.data));
  });

  app.get('/api/debt/payoff', (req, res) => {
    const query = DebtPayoffQuerySchema.safeParse(req.query);
    if (!query.success) {
      badRequest(res, query.error);
      return;
    }
    res.json(debtPayoffService.compareStrategies(query.data.monthlyPayment));
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  const handleError: ErrorRequestHandler = (error, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status = error instanceof multer.MulterError && error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    logger.warn('Request rejected', { path: req.path, error: describeError(error) });
    res.status(status).json({ error: describeError(error) });
  };
  app.use(handleError);

  return app;
};
