import request from 'supertest'
import { Registry } from 'prom-client'
import { createApp } from '../../src/http'
import { MetricsTracker } from '../../src/services/MetricsTracker'
import { loadClassifier } from '../../src/services/ModelLoader'
import { ENV } from '../../src/config'
import * as metrics from '../../src/utils/metrics'
import { Classifier } from '../../src/services/Classifier'
import { FailingClassifier, FixedClassifier, RecordingClassifier } from '../fixtures/classifiers'

function appWith(classifier: Classifier, bodyLimit?: number | string) {
  const tracker = new MetricsTracker()
  return { app: createApp({ classifier, metrics: tracker, bodyLimit }), tracker }
}

function flights(n: number) {
  return Array.from({ length: n }, (_, i) => ({ flight_id: `F${i}`, distance: 100 + (i % 4900), bad_weather: i % 3 === 0 }))
}

describe('inference HTTP API', () => {
  beforeEach(() => {
    metrics.setRegistry(new Registry())
  })

  describe('POST /predict', () => {
    test('returns the prediction for a valid flight', async () => {
      const { app, tracker } = appWith(new FixedClassifier(0.75))
      const res = await request(app).post('/predict').send({ flight_id: 'IB6250', distance: 1800, bad_weather: true })
      expect(res.status).toBe(200)
      expect(res.body).toEqual({ flight_id: 'IB6250', delay_probability: 0.75, delayed: true })
      expect(tracker.snapshot().total_predictions).toBe(1)
    })

    test('scores with the bundled model', async () => {
      const { app } = appWith(loadClassifier(ENV.MODEL_PATH))
      const res = await request(app).post('/predict').send({ flight_id: 'UX1092', distance: 2000, bad_weather: true })
      expect(res.status).toBe(200)
      expect(res.body.delay_probability).toBeCloseTo(0.8022, 4)
      expect(res.body.delayed).toBe(true)
    })

    test('0.5 is reported as not delayed', async () => {
      const { app } = appWith(new FixedClassifier(0.5))
      const res = await request(app).post('/predict').send({ flight_id: 'VY1001', distance: 600, bad_weather: false })
      expect(res.body).toEqual({ flight_id: 'VY1001', delay_probability: 0.5, delayed: false })
    })

    test.each([
      ['distance 50', { flight_id: 'A1', distance: 50, bad_weather: false }],
      ['distance 6000', { flight_id: 'A1', distance: 6000, bad_weather: false }],
      ['empty flight_id', { flight_id: '', distance: 300, bad_weather: false }],
    ])('%s is a 422 that never reaches the scorer', async (_label, body) => {
      const classifier = new RecordingClassifier()
      const { app, tracker } = appWith(classifier)
      const res = await request(app).post('/predict').send(body)
      expect(res.status).toBe(422)
      expect(res.body.reason.code).toBe('VALIDATION_SCHEMA_FAIL')
      expect(res.body.reason.category).toBe('VALIDATION')
      expect(res.body.issues).toHaveLength(1)
      expect(classifier.calls).toHaveLength(0)
      expect(tracker.snapshot().total_predictions).toBe(0)
    })

    test('malformed JSON is a validation failure', async () => {
      const { app } = appWith(new FixedClassifier(0.25))
      const res = await request(app).post('/predict').set('Content-Type', 'application/json').send('{"flight_id": ')
      expect(res.status).toBe(422)
      expect(res.body.reason.code).toBe('VALIDATION_SCHEMA_FAIL')
    })

    test('an unsupported charset is a client error, not a server fault', async () => {
      const { app, tracker } = appWith(new FixedClassifier(0.25))
      const res = await request(app)
        .post('/predict')
        .set('Content-Type', 'application/json; charset=klingon')
        .send('{"flight_id":"K1","distance":500,"bad_weather":false}')
      expect(res.status).toBe(415)
      expect(res.body.reason.code).toBe('CLIENT_UNREADABLE_BODY')
      expect(res.body.reason.category).toBe('CLIENT')
      expect(res.body.detail).toBe('Request body could not be read: unsupported charset "KLINGON"')
      expect(tracker.snapshot().total_predictions).toBe(0)
    })

    test('classifier failure is a 500 with the cause in the detail', async () => {
      const { app, tracker } = appWith(new FailingClassifier('model exploded'))
      const res = await request(app).post('/predict').send({ flight_id: 'IB1', distance: 700, bad_weather: false })
      expect(res.status).toBe(500)
      expect(res.body.detail).toBe('Prediction failed: model exploded')
      expect(res.body.reason.code).toBe('INTERNAL_SCORING_ERROR')
      expect(tracker.snapshot().total_predictions).toBe(0)
    })
  })

  describe('POST /predict-batch', () => {
    test('empty array', async () => {
      const { app } = appWith(new FixedClassifier(0.25))
      const res = await request(app).post('/predict-batch').send([])
      expect(res.status).toBe(200)
      expect(res.body).toEqual({ predictions: [], count: 0 })
    })

    test('mixed batch keeps valid items in order and drops the rest', async () => {
      const { app, tracker } = appWith(new RecordingClassifier())
      const res = await request(app).post('/predict-batch').send([
        { flight_id: 'B1', distance: 1000, bad_weather: true },
        { flight_id: 'B2', distance: 99, bad_weather: true },
        { flight_id: 'B3', distance: 2000, bad_weather: false },
      ])
      expect(res.status).toBe(200)
      expect(res.body.count).toBe(2)
      expect(res.body.predictions.map((p: { flight_id: string }) => p.flight_id)).toEqual(['B1', 'B3'])
      expect(res.body).not.toHaveProperty('dropped')
      expect(tracker.snapshot().total_predictions).toBe(2)
    })

    test('diagnostics=true reports dropped items', async () => {
      const { app } = appWith(new FixedClassifier(0.25))
      const res = await request(app).post('/predict-batch?diagnostics=true').send([
        { flight_id: 'B2', distance: 99, bad_weather: true },
        { flight_id: 'B1', distance: 1000, bad_weather: true },
      ])
      expect(res.body.count).toBe(1)
      expect(res.body.dropped).toEqual([
        { index: 0, issues: [{ path: 'distance', message: expect.any(String) }] },
      ])
    })

    test('a batch of 2000 flights is scored in full', async () => {
      const { app, tracker } = appWith(new FixedClassifier(0.25))
      const res = await request(app).post('/predict-batch').send(flights(2000))
      expect(res.status).toBe(200)
      expect(res.body.count).toBe(2000)
      expect(res.body.predictions[1999]).toEqual({ flight_id: 'F1999', delay_probability: 0.25, delayed: false })
      expect(tracker.snapshot().total_predictions).toBe(2000)
    })

    test('a body over the size limit is a 413 envelope', async () => {
      const { app, tracker } = appWith(new FixedClassifier(0.25), '1kb')
      const res = await request(app).post('/predict-batch').send(flights(50))
      expect(res.status).toBe(413)
      expect(res.body.reason.code).toBe('CLIENT_PAYLOAD_TOO_LARGE')
      expect(res.body.detail).toBe('Request body exceeds the size limit')
      expect(tracker.snapshot().total_predictions).toBe(0)
    })

    test('a non-array body is a 422', async () => {
      const { app } = appWith(new FixedClassifier(0.25))
      const res = await request(app).post('/predict-batch').send({ flight_id: 'B1', distance: 1000, bad_weather: true })
      expect(res.status).toBe(422)
      expect(res.body.detail).toBe('(body): Expected an array of flights')
    })

    test('classifier failure aborts the batch with a 500', async () => {
      const { app, tracker } = appWith(new FailingClassifier('bad weights', [2000]))
      const res = await request(app).post('/predict-batch').send([
        { flight_id: 'B1', distance: 1000, bad_weather: true },
        { flight_id: 'B2', distance: 2000, bad_weather: true },
      ])
      expect(res.status).toBe(500)
      expect(res.body.detail).toBe('Batch prediction failed: bad weights')
      expect(res.body.reason.context).toEqual({ index: 1, flight_id: 'B2' })
      expect(tracker.snapshot().total_predictions).toBe(0)
    })
  })

  describe('GET /metrics', () => {
    test('counts single and batch predictions together', async () => {
      const { app } = appWith(new FixedClassifier(0.25))
      await request(app).post('/predict').send({ flight_id: 'M1', distance: 500, bad_weather: false })
      await request(app).post('/predict-batch').send([
        { flight_id: 'M2', distance: 500, bad_weather: false },
        { flight_id: 'M3', distance: 500, bad_weather: true },
      ])
      await request(app).post('/predict').send({ flight_id: 'M4', distance: 5, bad_weather: false })
      const res = await request(app).get('/metrics')
      expect(res.status).toBe(200)
      expect(res.body.total_predictions).toBe(3)
      expect(res.body.uptime_seconds).toBeGreaterThanOrEqual(0)
    })

    test('concurrent submissions lose no updates', async () => {
      const { app, tracker } = appWith(new FixedClassifier(0.25))
      const singles = Array.from({ length: 20 }, (_, i) =>
        request(app).post('/predict').send({ flight_id: `C${i}`, distance: 100 + i, bad_weather: i % 2 === 0 }))
      const batches = Array.from({ length: 5 }, (_, i) =>
        request(app).post('/predict-batch').send([
          { flight_id: `D${i}a`, distance: 1000, bad_weather: false },
          { flight_id: `D${i}b`, distance: 1000, bad_weather: true },
          { flight_id: `D${i}c`, distance: 1000, bad_weather: false },
        ]))
      const responses = await Promise.all([...singles, ...batches])
      expect(responses.every(r => r.status === 200)).toBe(true)
      expect(tracker.snapshot().total_predictions).toBe(35)
      const res = await request(app).get('/metrics')
      expect(res.body.total_predictions).toBe(35)
    })

    test('uptime does not decrease between calls', async () => {
      const { app } = appWith(new FixedClassifier(0.25))
      const first = await request(app).get('/metrics')
      const second = await request(app).get('/metrics')
      expect(second.body.uptime_seconds).toBeGreaterThanOrEqual(first.body.uptime_seconds)
    })

    test('prometheus exposition includes the prediction counter', async () => {
      const { app } = appWith(new FixedClassifier(0.25))
      await request(app).post('/predict').send({ flight_id: 'P1', distance: 500, bad_weather: false })
      const res = await request(app).get('/metrics/prometheus')
      expect(res.status).toBe(200)
      expect(res.text).toContain('flight_predictions_total{mode="single"} 1')
    })
  })

  describe('POST /simulate-error', () => {
    test('raise_error: true is a 418 simulated error', async () => {
      const { app } = appWith(new FixedClassifier(0.25))
      const res = await request(app).post('/simulate-error').send({ raise_error: true })
      expect(res.status).toBe(418)
      expect(res.body.detail).toBe('Este es un error simulado para enseñar manejo')
      expect(res.body.reason.code).toBe('DIAGNOSTIC_SIMULATED')
    })

    test('raise_error: false is acknowledged', async () => {
      const { app, tracker } = appWith(new FixedClassifier(0.25))
      const res = await request(app).post('/simulate-error').send({ raise_error: false })
      expect(res.status).toBe(200)
      expect(res.body).toEqual({ status: 'ok', message: 'No se produjo error' })
      expect(tracker.snapshot().total_predictions).toBe(0)
    })

    test('a missing flag is a validation failure', async () => {
      const { app } = appWith(new FixedClassifier(0.25))
      const res = await request(app).post('/simulate-error').send({})
      expect(res.status).toBe(422)
    })
  })

  describe('service metadata', () => {
    test('GET /info', async () => {
      const { app } = appWith(new FixedClassifier(0.25))
      const res = await request(app).get('/info')
      expect(res.status).toBe(200)
      expect(res.body).toEqual({
        service: 'Flight Delay ML API',
        description: 'Example API serving a pre-trained flight delay classifier',
        version: '1.0',
        features: ['predict', 'predict-batch', 'metrics', 'simulate-error'],
      })
    })

    test('GET /health', async () => {
      const { app } = appWith(new FixedClassifier(0.25))
      const res = await request(app).get('/health')
      expect(res.body).toEqual({ status: 'healthy' })
    })

    test('unknown routes are 404 envelopes', async () => {
      const { app } = appWith(new FixedClassifier(0.25))
      const res = await request(app).get('/nope')
      expect(res.status).toBe(404)
      expect(res.body.reason.code).toBe('CLIENT_NOT_FOUND')
    })
  })

  describe('correlation ids', () => {
    test('echoes a provided x-corr-id in header and envelope', async () => {
      const { app } = appWith(new FixedClassifier(0.25))
      const res = await request(app).post('/simulate-error').set('x-corr-id', 'corr_test_1').send({ raise_error: true })
      expect(res.headers['x-corr-id']).toBe('corr_test_1')
      expect(res.body.corr_id).toBe('corr_test_1')
    })

    test('generates one when absent', async () => {
      const { app } = appWith(new FixedClassifier(0.25))
      const res = await request(app).get('/health')
      expect(res.headers['x-corr-id']).toMatch(/^corr_[0-9A-Z]{26}$/)
    })
  })
})
