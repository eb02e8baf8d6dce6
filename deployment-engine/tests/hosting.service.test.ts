/**
 * Hosting Service Tests
 */

import {
  CREDIT_INPUT_SCHEMA,
  CREDIT_OUTPUT_SCHEMA,
  PublishServiceRequest,
  ServiceErrorCode,
} from '@creditops/types';
import { CreditDefaultModel, creditDefaultAdapter } from '@creditops/ml';
import { createDefaultCatalog, CREDIT_DEFAULT_ADAPTER } from '../src/adapters';
import { HostingService } from '../src/services/hosting.service';
import { InMemoryServiceRegistry } from '../src/services/service-registry';
import { quietLogger, SAMPLE_ACCOUNT, trainModels } from './helpers';

describe('HostingService', () => {
  let first: CreditDefaultModel;
  let second: CreditDefaultModel;
  let hosting: HostingService;

  function publishRequest(overrides: Partial<PublishServiceRequest> = {}): PublishServiceRequest {
    return {
      name: 'credit',
      version: '1.0',
      adapter: CREDIT_DEFAULT_ADAPTER,
      model: first.toJSON(),
      inputs: CREDIT_INPUT_SCHEMA,
      outputs: CREDIT_OUTPUT_SCHEMA,
      ...overrides,
    };
  }

  beforeAll(async () => {
    ({ first, second } = await trainModels());
  });

  beforeEach(() => {
    hosting = new HostingService(new InMemoryServiceRegistry(), createDefaultCatalog(), quietLogger('hosting'));
  });

  describe('publish', () => {
    it('should register the service bound to the published model', async () => {
      const descriptor = await hosting.publish(publishRequest({ description: 'default risk' }));

      expect(descriptor).toMatchObject({
        name: 'credit',
        version: '1.0',
        revision: 1,
        adapter: 'credit-default',
        description: 'default risk',
        modelId: first.id,
      });
    });

    it('should normalise the version it stores', async () => {
      const descriptor = await hosting.publish(publishRequest({ version: 'v2.1' }));

      expect(descriptor.version).toBe('2.1');
      expect((await hosting.fetch('credit', '2.1')).modelId).toBe(first.id);
    });

    it('should accept schemas declared in another field order', async () => {
      const { account_id, ...rest } = CREDIT_INPUT_SCHEMA;

      const descriptor = await hosting.publish(publishRequest({ inputs: { ...rest, account_id } }));

      expect(descriptor.revision).toBe(1);
    });

    it('should reject inputs that differ from the adapter schema', async () => {
      const { age, ...withoutAge } = CREDIT_INPUT_SCHEMA;

      expect(age).toBe('numeric');
      await expect(hosting.publish(publishRequest({ inputs: withoutAge }))).rejects.toMatchObject({
        code: ServiceErrorCode.SCHEMA_MISMATCH,
      });
    });

    it('should reject outputs that differ from the adapter schema', async () => {
      await expect(
        hosting.publish(publishRequest({ outputs: { answer: 'character' } }))
      ).rejects.toMatchObject({ code: ServiceErrorCode.SCHEMA_MISMATCH });
    });

    it('should reject an unknown adapter', async () => {
      await expect(hosting.publish(publishRequest({ adapter: 'churn' }))).rejects.toMatchObject({
        code: ServiceErrorCode.INVALID_REQUEST,
        message: 'Unknown adapter "churn". Available: credit-default',
      });
    });

    it('should reject a model the adapter cannot load', async () => {
      await expect(hosting.publish(publishRequest({ model: { format: 'other' } }))).rejects.toMatchObject({
        code: ServiceErrorCode.INVALID_REQUEST,
      });
    });

    it('should reject a model whose trees read features the encoder does not produce', async () => {
      const artifact = first.toJSON();
      const leaf = { kind: 'leaf' as const, value: 0 };
      const model = {
        ...artifact,
        booster: {
          ...artifact.booster,
          trees: [{ kind: 'split' as const, feature: 999, threshold: 0.5, gain: 1, left: leaf, right: leaf }],
        },
      };

      await expect(hosting.publish(publishRequest({ model }))).rejects.toMatchObject({
        code: ServiceErrorCode.INVALID_REQUEST,
        message: `Model rejected by adapter credit-default: Tree 0 splits on feature 999 but the model has ${artifact.booster.featureCount} features`,
      });
      await expect(hosting.list()).resolves.toEqual([]);
    });

    it('should reject an invalid service name', async () => {
      await expect(hosting.publish(publishRequest({ name: '1credit' }))).rejects.toMatchObject({
        code: ServiceErrorCode.INVALID_REQUEST,
      });
    });

    it('should reject publishing the same version twice', async () => {
      await hosting.publish(publishRequest());

      await expect(hosting.publish(publishRequest({ model: second.toJSON() }))).rejects.toMatchObject({
        code: ServiceErrorCode.CONFLICT,
      });
    });
  });

  describe('consume', () => {
    beforeEach(async () => {
      await hosting.publish(publishRequest());
    });

    it('should answer with the adapter output of the bound model', async () => {
      const response = await hosting.consume('credit', '1.0', SAMPLE_ACCOUNT);

      expect(response).toEqual({ answer: [creditDefaultAdapter(SAMPLE_ACCOUNT, first)] });
    });

    it('should accept the version with a v prefix', async () => {
      const response = await hosting.consume('credit', 'v1.0', SAMPLE_ACCOUNT);

      expect(response.answer).toHaveLength(1);
    });

    it('should reject a record with a mistyped field', async () => {
      await expect(
        hosting.consume('credit', '1.0', { ...SAMPLE_ACCOUNT, income: 'high' })
      ).rejects.toMatchObject({ code: ServiceErrorCode.SCHEMA_MISMATCH });
    });

    it('should reject a record with a missing field', async () => {
      const { sex, ...rest } = SAMPLE_ACCOUNT;

      expect(sex).toBe('female');
      await expect(hosting.consume('credit', '1.0', rest)).rejects.toMatchObject({
        code: ServiceErrorCode.SCHEMA_MISMATCH,
        message: 'Input does not match schema: sex: Required',
      });
    });

    it('should reject a record with an undeclared field', async () => {
      await expect(
        hosting.consume('credit', '1.0', { ...SAMPLE_ACCOUNT, bad_ind: 1 })
      ).rejects.toMatchObject({ code: ServiceErrorCode.SCHEMA_MISMATCH });
    });

    it('should fail with NOT_FOUND for an unknown version', async () => {
      await expect(hosting.consume('credit', '2.0', SAMPLE_ACCOUNT)).rejects.toMatchObject({
        code: ServiceErrorCode.NOT_FOUND,
      });
    });
  });

  describe('update', () => {
    beforeEach(async () => {
      await hosting.publish(publishRequest());
    });

    it('should serve the new model under the same name and version', async () => {
      const descriptor = await hosting.update('credit', '1.0', { model: second.toJSON() });
      const response = await hosting.consume('credit', '1.0', SAMPLE_ACCOUNT);

      expect(descriptor).toMatchObject({ name: 'credit', version: '1.0', revision: 2, modelId: second.id });
      expect(response).toEqual({ answer: [creditDefaultAdapter(SAMPLE_ACCOUNT, second)] });
    });

    it('should reject a stale expected revision', async () => {
      await hosting.update('credit', '1.0', { model: second.toJSON(), expectedRevision: 1 });

      await expect(
        hosting.update('credit', '1.0', { model: first.toJSON(), expectedRevision: 1 })
      ).rejects.toMatchObject({ code: ServiceErrorCode.REVISION_MISMATCH });
      expect((await hosting.fetch('credit', '1.0')).modelId).toBe(second.id);
    });

    it('should keep the old model when the new one cannot be loaded', async () => {
      await expect(hosting.update('credit', '1.0', { model: {} })).rejects.toMatchObject({
        code: ServiceErrorCode.INVALID_REQUEST,
      });
      expect(await hosting.fetch('credit', '1.0')).toMatchObject({ revision: 1, modelId: first.id });
    });

    it('should fail with NOT_FOUND for an unknown service', async () => {
      await expect(hosting.update('credit', '3.0', { model: second.toJSON() })).rejects.toMatchObject({
        code: ServiceErrorCode.NOT_FOUND,
      });
    });

    it('should refuse in-place updates when versions are immutable', async () => {
      const strict = new HostingService(new InMemoryServiceRegistry(), createDefaultCatalog(), quietLogger('hosting'), {
        immutableVersions: true,
      });
      await strict.publish(publishRequest());

      await expect(strict.update('credit', '1.0', { model: second.toJSON() })).rejects.toMatchObject({
        code: ServiceErrorCode.VERSION_IMMUTABLE,
        message: 'Service credit version 1.0 is immutable; publish a new version instead',
      });
    });
  });

  describe('remove', () => {
    it('should make later fetches and invocations fail with NOT_FOUND', async () => {
      await hosting.publish(publishRequest());

      await hosting.remove('credit', '1.0');

      await expect(hosting.fetch('credit', '1.0')).rejects.toMatchObject({ code: ServiceErrorCode.NOT_FOUND });
      await expect(hosting.consume('credit', '1.0', SAMPLE_ACCOUNT)).rejects.toMatchObject({
        code: ServiceErrorCode.NOT_FOUND,
      });
      expect(await hosting.list()).toEqual([]);
    });
  });

  describe('swagger', () => {
    it('should describe the published service', async () => {
      await hosting.publish(publishRequest());

      const document = await hosting.swagger('credit', '1.0', { host: 'scoring.internal:3001' });

      expect(document.info).toEqual({
        title: 'credit',
        description: 'Service credit (adapter credit-default)',
        version: '1.0',
      });
      expect(document.host).toBe('scoring.internal:3001');
    });
  });
});
