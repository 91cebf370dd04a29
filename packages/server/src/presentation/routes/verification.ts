import express from 'express';
import type { VerificationController } from '../controllers/VerificationController.js';
import { asyncHandler } from '../middleware/errorHandler.js';

/**
 * Verification Router
 *
 * Controllerベースのルーティング
 */
export function createVerificationRouter(verificationController: VerificationController): express.Router {
  const router = express.Router();
  const jsonParser = express.json();

  /**
   * POST /api/verification/passes
   * 検証パスを実行（キューがあればジョブ投入）
   */
  router.post('/verification/passes', jsonParser, asyncHandler(async (req, res) => {
    await verificationController.runPass(req, res);
  }));

  /**
   * GET /api/verdicts
   * 判定済みの録画一覧
   */
  router.get('/verdicts', asyncHandler(async (req, res) => {
    await verificationController.listVerdicts(req, res);
  }));

  /**
   * GET /api/recordings/:id/verdict
   * 1録画の判定
   */
  router.get('/recordings/:id/verdict', asyncHandler(async (req, res) => {
    await verificationController.getVerdict(req, res);
  }));

  /**
   * DELETE /api/duration-cache/:id
   * キャッシュを削除して次のパスで再プローブさせる
   */
  router.delete('/duration-cache/:id', asyncHandler(async (req, res) => {
    await verificationController.clearCache(req, res);
  }));

  return router;
}
