import { describe, it, expect, vi } from 'vitest';
import { defineFactory } from '../../factory/factory.js';
import { lazyAttribute, selfAttribute } from '../attributes.js';
import {
  PostGenerationMethodCall,
  postGeneration,
  postGenerationMethodCall,
  relatedFactory,
  relatedFactoryList,
} from '../post-generation.js';
import { ErrorCode } from '../../errors/codes.js';

class Account {
  [key: string]: unknown;
  password = '';
  readonly calls: unknown[][] = [];

  constructor(attributes: Record<string, unknown>) {
    Object.assign(this, attributes);
  }

  setPassword(...args: unknown[]): string {
    this.calls.push(args);
    this.password = String(args[0]);
    return 'set';
  }
}

class Profile {
  readonly owner: unknown;
  readonly bio: unknown;
  readonly ownerName: unknown;

  constructor(attributes: { owner?: unknown; bio?: unknown; ownerName?: unknown }) {
    this.owner = attributes.owner;
    this.bio = attributes.bio;
    this.ownerName = attributes.ownerName;
  }
}

describe('post-generation declarations', () => {
  describe('postGeneration', () => {
    it('receives the instance, the strategy flag and the extracted value', () => {
      const hook = vi.fn(() => 'done');
      const Factory = defineFactory<Account>({
        name: 'AccountFactory',
        options: { model: Account },
        declarations: { name: 'ada', log: postGeneration(hook) },
      });

      const built = Factory.build();
      const created = Factory.create({ log: 'x', log__level: 2 });

      expect(hook).toHaveBeenNthCalledWith(1, built, false, undefined, {});
      expect(hook).toHaveBeenNthCalledWith(2, created, true, 'x', { level: 2 });
      expect('log' in created).toBe(false);
      expect('log__level' in created).toBe(false);
    });

    it('runs in declaration order after instantiation', () => {
      const order: string[] = [];
      const Factory = defineFactory<Account>({
        name: 'AccountFactory',
        options: { model: Account },
        declarations: {
          first: postGeneration(() => order.push('first')),
          name: 'ada',
          second: postGeneration((account: Account) => order.push(`second:${String(account.name)}`)),
        },
      });

      Factory.build();
      expect(order).toEqual(['first', 'second:ada']);
    });

    it('replaces an attribute declaration of the same name', () => {
      const Base = defineFactory<Account>({
        name: 'Base',
        options: { model: Account },
        declarations: { audit: 'plain' },
      });
      const Child = defineFactory<Account>({
        name: 'Child',
        parents: [Base],
        declarations: { audit: postGeneration(() => 'audited') },
      });

      expect(Child.preDeclarations.has('audit')).toBe(false);
      expect(Child.postDeclarations.has('audit')).toBe(true);
      expect('audit' in Child.build()).toBe(false);
    });
  });

  describe('postGenerationMethodCall', () => {
    const Factory = defineFactory<Account>({
      name: 'AccountFactory',
      options: { model: Account },
      declarations: {
        name: 'ada',
        password: postGenerationMethodCall('setPassword', 'default-password'),
      },
    });

    it('calls the method with the declared arguments', () => {
      const account = Factory.build();

      expect(account.password).toBe('default-password');
      expect(account.calls).toEqual([['default-password']]);
    });

    it('replaces the arguments with an extracted value', () => {
      expect(Factory.build({ password: 'test-secret' }).calls).toEqual([['test-secret']]);
    });

    it('passes keyword overrides as a trailing object', () => {
      const WithOptions = defineFactory<Account>({
        name: 'WithOptions',
        options: { model: Account },
        declarations: {
          password: new PostGenerationMethodCall('setPassword', ['pw'], { hash: 'md5' }),
        },
      });

      expect(WithOptions.build().calls).toEqual([['pw', { hash: 'md5' }]]);
      expect(WithOptions.build({ password__hash: 'sha256' }).calls).toEqual([['pw', { hash: 'sha256' }]]);
    });

    it('fails when the target is not a method', () => {
      const Broken = defineFactory<Account>({
        name: 'Broken',
        options: { model: Account },
        declarations: { name: 'ada', call: postGenerationMethodCall('name') },
      });

      expect(() => Broken.build()).toThrowFixtureError(
        ErrorCode.INVALID_DECLARATION,
        'postGenerationMethodCall: "name" is not a method of the generated object'
      );
    });
  });

  describe('relatedFactory', () => {
    function defineFactories() {
      const results: Record<string, unknown>[] = [];
      const ProfileFactory = defineFactory<Profile>({
        name: 'ProfileFactory',
        options: { model: Profile },
        declarations: { bio: 'hello', ownerName: selfAttribute('owner.name', { default: 'nobody' }) },
      });
      const AccountFactory = defineFactory<Account>({
        name: 'AccountFactory',
        options: { model: Account },
        declarations: {
          name: 'ada',
          profile: relatedFactory(ProfileFactory, 'owner'),
          extras: relatedFactoryList(ProfileFactory, '', 2, { bio: 'extra' }),
        },
        hooks: {
          afterPostGeneration(_instance, _create, postResults) {
            results.push(postResults);
          },
        },
      });
      return { AccountFactory, results };
    }

    it('builds a related object that receives the parent', () => {
      const { AccountFactory, results } = defineFactories();

      const account = AccountFactory.build();
      const profile = results[0]?.profile;

      expect(profile).toBeInstanceOf(Profile);
      expect(profile).toMatchObject({ owner: account, bio: 'hello', ownerName: 'ada' });
      expect('profile' in account).toBe(false);
    });

    it('forwards deep overrides and reuses a provided value', () => {
      const { AccountFactory, results } = defineFactories();
      const existing = new Profile({ bio: 'mine' });

      AccountFactory.build({ profile__bio: 'custom' });
      AccountFactory.build({ profile: existing });

      expect(results[0]?.profile).toMatchObject({ bio: 'custom' });
      expect(results[1]?.profile).toBe(existing);
    });

    it('exposes the built parent as factoryInstance', () => {
      const parents: string[] = [];
      const results: Record<string, unknown>[] = [];
      const NoteFactory = defineFactory<Profile>({
        name: 'NoteFactory',
        options: { model: Profile },
        declarations: {
          bio: lazyAttribute((obj) => {
            parents.push(String(obj.factoryParent));
            return obj.factoryInstance;
          }),
        },
      });
      const AccountFactory = defineFactory<Account>({
        name: 'AccountFactory',
        options: { model: Account },
        declarations: { name: 'ada', note: relatedFactory(NoteFactory) },
        hooks: {
          afterPostGeneration(_instance, _create, postResults) {
            results.push(postResults);
          },
        },
      });

      const account = AccountFactory.build();

      expect(results[0]?.note).toMatchObject({ bio: account, owner: undefined });
      expect(parents).toEqual(['<Resolver for AccountFactory>']);
    });

    it('builds lists of related objects', () => {
      const { AccountFactory, results } = defineFactories();

      AccountFactory.build();
      const extras = results[0]?.extras;

      expect(Array.isArray(extras)).toBe(true);
      expect(extras).toHaveLength(2);
      expect(extras).toEqual([
        new Profile({ bio: 'extra', ownerName: 'nobody' }),
        new Profile({ bio: 'extra', ownerName: 'nobody' }),
      ]);
    });

    it('evaluates a size function on every call', () => {
      let size = 0;
      const ProfileFactory = defineFactory<Profile>({ name: 'ProfileFactory', options: { model: Profile } });
      const counts: number[] = [];
      const Factory = defineFactory<Account>({
        name: 'AccountFactory',
        options: { model: Account },
        declarations: { profiles: relatedFactoryList(ProfileFactory, 'owner', () => (size += 1)) },
        hooks: {
          afterPostGeneration(_instance, _create, results) {
            const { profiles } = results;
            counts.push(Array.isArray(profiles) ? profiles.length : -1);
          },
        },
      });

      Factory.build();
      Factory.build();

      expect(counts).toEqual([1, 2]);
    });
  });
});
