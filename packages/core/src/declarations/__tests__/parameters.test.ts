import { describe, it, expect } from 'vitest';
import { defineFactory, StubObject } from '../../factory/factory.js';
import { lazyAttribute, lazyFunction } from '../attributes.js';
import { maybe } from '../maybe.js';
import { SimpleParameter, Trait, trait } from '../parameters.js';
import { postGeneration } from '../post-generation.js';
import { subFactory } from '../sub-factory.js';
import { BuilderPhase } from '../../types/enums.js';
import { ErrorCode } from '../../errors/codes.js';

class Order {
  [key: string]: unknown;

  constructor(attributes: Record<string, unknown>) {
    Object.assign(this, attributes);
  }
}

describe('parameters', () => {
  describe('traits', () => {
    const OrderFactory = defineFactory<Order>({
      name: 'OrderFactory',
      options: { model: Order },
      declarations: { one: null, two: null, three: null, four: null, status: 'new' },
      params: {
        even: trait({ two: true, four: true }),
        odd: trait({ one: true, three: true }),
        full: trait({ even: true, odd: true }),
        override: trait({ even: true, two: false }),
        shipped: trait({ status: 'shipped' }),
      },
    });

    it('leave declarations alone when off', () => {
      expect(OrderFactory.build()).toEqual(
        new Order({ one: null, two: null, three: null, four: null, status: 'new' })
      );
    });

    it('apply their overrides when on', () => {
      expect(OrderFactory.build({ shipped: true }).status).toBe('shipped');
      expect(OrderFactory.build({ even: true })).toEqual(
        new Order({ one: null, two: true, three: null, four: true, status: 'new' })
      );
    });

    it('chain through other traits', () => {
      expect(OrderFactory.build({ full: true })).toEqual(
        new Order({ one: true, two: true, three: true, four: true, status: 'new' })
      );
      expect(OrderFactory.build({ override: true })).toEqual(
        new Order({ one: null, two: false, three: null, four: true, status: 'new' })
      );
    });

    it('yield to explicit overrides', () => {
      expect(OrderFactory.build({ even: true, two: 'explicit' }).two).toBe('explicit');
    });

    it('are ordered after the traits they enable', () => {
      expect(OrderFactory.parameterOrder).toEqual(['even', 'odd', 'full', 'override', 'shipped']);
    });

    it('reach into nested factories', () => {
      const PersonFactory = defineFactory<StubObject>({
        name: 'PersonFactory',
        options: { model: StubObject, strategy: 'stub' },
        declarations: { name: 'Worker' },
      });
      const TeamFactory = defineFactory<StubObject>({
        name: 'TeamFactory',
        options: { model: StubObject, strategy: 'stub' },
        declarations: { lead: subFactory(PersonFactory), lead__name: 'Lead' },
        params: { boss: trait({ lead__name: 'Boss' }) },
      });

      expect(TeamFactory.stub().lead).toEqual(new StubObject({ name: 'Lead' }));
      expect(TeamFactory.stub({ boss: true }).lead).toEqual(new StubObject({ name: 'Boss' }));
    });

    it('leave nested objects as their factories build them when off', () => {
      const PersonFactory = defineFactory<StubObject>({
        name: 'PersonFactory',
        options: { model: StubObject, strategy: 'stub' },
        declarations: { name: 'anon' },
      });
      const PetFactory = defineFactory<StubObject>({
        name: 'PetFactory',
        options: { model: StubObject, strategy: 'stub' },
      });
      const CrewFactory = defineFactory<StubObject>({
        name: 'CrewFactory',
        options: { model: StubObject, strategy: 'stub' },
        declarations: {
          lead: subFactory(PersonFactory, { name: 'default' }),
          deckhand: subFactory(PersonFactory),
          pet: subFactory(PetFactory),
        },
        params: { boss: trait({ lead__name: 'Boss', deckhand__name: 'Sailor', pet__name: 'Rex' }) },
      });

      expect(CrewFactory.stub()).toEqual(
        new StubObject({
          lead: new StubObject({ name: 'default' }),
          deckhand: new StubObject({ name: 'anon' }),
          pet: new StubObject({}),
        })
      );
      expect(CrewFactory.stub({ boss: true })).toEqual(
        new StubObject({
          lead: new StubObject({ name: 'Boss' }),
          deckhand: new StubObject({ name: 'Sailor' }),
          pet: new StubObject({ name: 'Rex' }),
        })
      );
    });

    it('report the parameters they read', () => {
      const bundle = new Trait({ even: true, status: 'x' });

      expect(bundle.getRevdeps(['even', 'odd'])).toEqual(['even']);
    });
  });

  describe('cycles', () => {
    it('fail at definition time naming the cyclic parameters', () => {
      expect(() =>
        defineFactory<Order>({
          name: 'LoopFactory',
          options: { model: Order },
          params: { b: trait({ a: true }), a: trait({ b: true }), c: 1 },
        })
      ).toThrowFixtureError(
        ErrorCode.CYCLIC_PARAMETERS,
        'Cyclic definition detected on LoopFactory; params around a, b'
      );
    });

    it('order a diamond so dependencies come first', () => {
      const Diamond = defineFactory<Order>({
        name: 'Diamond',
        options: { model: Order },
        declarations: { value: 0 },
        params: {
          c: trait({ a: true, b: true }),
          a: trait({ d: true }),
          b: trait({ d: true }),
          d: trait({ value: 1 }),
        },
      });

      expect(Diamond.parameterOrder).toEqual(['d', 'a', 'b', 'c']);
      expect(Diamond.build({ c: true }).value).toBe(1);
      expect(Diamond.build().value).toBe(0);
    });
  });

  describe('simple parameters', () => {
    it('wrap raw values only', () => {
      const bundle = trait({});

      expect(SimpleParameter.wrap(bundle)).toBe(bundle);
      expect(SimpleParameter.wrap(3)).toEqual(new SimpleParameter(3));
      expect(new SimpleParameter(3).asDeclarations('size')).toEqual({ size: 3 });
    });
  });
});

describe('maybe', () => {
  it('chooses by a named attribute', () => {
    const Factory = defineFactory<Order>({
      name: 'Accounts',
      options: { model: Order },
      declarations: { isAdmin: false, level: maybe('isAdmin', 'admin', 'user') },
    });

    expect(Factory.build().level).toBe('user');
    expect(Factory.build({ isAdmin: true }).level).toBe('admin');
  });

  it('chooses by a declaration and evaluates the chosen branch only', () => {
    let evaluated = 0;
    const Factory = defineFactory<Order>({
      name: 'Coins',
      options: { model: Order },
      declarations: {
        heads: true,
        side: maybe(
          lazyAttribute((obj) => obj.get('heads')),
          lazyFunction(() => {
            evaluated += 1;
            return 'heads';
          }),
          'tails'
        ),
      },
    });

    expect(Factory.build({ heads: false }).side).toBe('tails');
    expect(evaluated).toBe(0);
    expect(Factory.build().side).toBe('heads');
    expect(evaluated).toBe(1);
  });

  it('takes the phase of its branches', () => {
    const sent: unknown[] = [];
    const Factory = defineFactory<Order>({
      name: 'Mailer',
      options: { model: Order },
      declarations: {
        sendMail: false,
        mail: maybe('sendMail', postGeneration((order: Order) => sent.push(order))),
      },
    });

    expect(maybe('x', postGeneration(() => 1)).phase).toBe(BuilderPhase.POST_INSTANTIATION);
    expect(maybe('x', 1, 2).phase).toBe(BuilderPhase.ATTRIBUTE_RESOLUTION);

    const quiet = Factory.build();
    const loud = Factory.build({ sendMail: true });

    expect('mail' in quiet).toBe(false);
    expect(sent).toEqual([loud]);
  });

  it('rejects branches from different phases', () => {
    expect(() => maybe('x', lazyFunction(() => 1), postGeneration(() => 1))).toThrowFixtureError(
      ErrorCode.INVALID_DECLARATION,
      'Inconsistent phases for maybe(): yes is attribute_resolution, no is post_instantiation'
    );
  });
});
