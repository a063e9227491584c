import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { apiKeyMatches, authenticate } from './auth.js';

describe('Auth Middleware', () => {
  describe('apiKeyMatches', () => {
    it('should accept the configured key', () => {
      expect(apiKeyMatches('test-api-key', 'test-api-key')).toBe(true);
    });

    it('should reject any other key, including one of a different length', () => {
      expect(apiKeyMatches('test-api-kez', 'test-api-key')).toBe(false);
      expect(apiKeyMatches('test', 'test-api-key')).toBe(false);
    });
  });

  describe('authenticate', () => {
    const app = express();
    app.get('/protected', authenticate('test-api-key'), (_req, res) => {
      res.json({ success: true });
    });

    it('should let a valid Bearer key through', async () => {
      const res = await request(app).get('/protected').set('Authorization', 'Bearer test-api-key');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true });
    });

    it('should reject a missing header', async () => {
      const res = await request(app).get('/protected');

      expect(res.status).toBe(401);
      expect(res.body).toEqual({
        success: false,
        error: 'Unauthorized: Missing or invalid Authorization header',
        code: 'UNAUTHORIZED',
      });
    });

    it('should reject a non-Bearer scheme', async () => {
      const res = await request(app).get('/protected').set('Authorization', 'Basic dGVzdA==');

      expect(res.status).toBe(401);
      expect(res.body.error).toBe('Unauthorized: Missing or invalid Authorization header');
    });

    it('should reject a wrong key', async () => {
      const res = await request(app).get('/protected').set('Authorization', 'Bearer wrong-key');

      expect(res.status).toBe(401);
      expect(res.body.error).toBe('Unauthorized: Invalid API key');
    });
  });
});
