import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryDatabase } from '../../../__tests__/memory-database';
import { CascadeEngine } from '../cascade.engine';
import { CategoryAttributeStore } from '../category-attribute.store';
import { CascadeWarning } from '../category-attributes.types';

const createLogger = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe('CascadeEngine', () => {
  let db: MemoryDatabase;
  let log: ReturnType<typeof createLogger>;
  let engine: CascadeEngine;

  const bindDirect = (categoryId: number, isRequired = false, sort = 0) =>
    db.categoryAttributes.insert({ category_id: categoryId, attribute_id: 10, is_required: isRequired, sort });

  const copyFrom = (categoryId: number, sourceCategoryId: number) =>
    db.categoryAttributes.insert({
      category_id: categoryId,
      attribute_id: 10,
      is_required: false,
      sort: 0,
      inherited_from_category_id: sourceCategoryId,
    });

  beforeEach(() => {
    //     1
    //   2   3
    //   4
    db = new MemoryDatabase().addCategory(1).addCategory(2, 1).addCategory(3, 1).addCategory(4, 2).addAttribute(10);
    log = createLogger();
    engine = new CascadeEngine(db, log);
  });

  describe('cascadeBind', () => {
    it('copies the binding to every descendant with the source as provenance', async () => {
      await bindDirect(1, true, 2);

      const report = await engine.cascadeBind(1, 10, true, 2);

      expect(report).toMatchObject({ total_descendants: 3, applied: 3, skipped: 0, failed: 0, aborted: false });
      for (const categoryId of [2, 3, 4]) {
        expect(db.liveRow(categoryId, 10)).toMatchObject({
          is_required: true,
          sort: 2,
          inherited_from_category_id: 1,
        });
      }
    });

    it('never overwrites a descendant that already has the attribute', async () => {
      await bindDirect(1);
      await bindDirect(2, false, 9);

      const report = await engine.cascadeBind(1, 10, true, 0);

      expect(report).toMatchObject({ applied: 2, skipped: 1 });
      expect(db.liveRow(2, 10)).toMatchObject({ is_required: false, sort: 9, inherited_from_category_id: null });
    });

    it('re-points a copy taken from above the source', async () => {
      await bindDirect(1);
      await copyFrom(4, 1);
      await bindDirect(2, true, 5);

      const report = await engine.cascadeBind(2, 10, true, 5);

      expect(report).toMatchObject({ total_descendants: 1, applied: 1, skipped: 0 });
      expect(db.liveRow(4, 10)).toMatchObject({ is_required: true, sort: 5, inherited_from_category_id: 2 });
    });

    it('leaves copies taken from below the source alone', async () => {
      await bindDirect(1);
      await bindDirect(2, true, 5);
      await copyFrom(4, 2);

      const report = await engine.cascadeBind(1, 10, false, 0);

      expect(report).toMatchObject({ applied: 1, skipped: 2 });
      expect(db.liveRow(4, 10)).toMatchObject({ inherited_from_category_id: 2 });
    });

    it('records a failing descendant and carries on with its siblings', async () => {
      await bindDirect(1);
      db.failWrites((operation) => operation.kind === 'insert' && operation.category_id === 2);

      const report = await engine.cascadeBind(1, 10, false, 0);

      expect(report).toMatchObject({ applied: 2, skipped: 0, failed: 1, aborted: false });
      expect(report.warnings).toHaveLength(1);
      expect(report.warnings[0]).toBeInstanceOf(CascadeWarning);
      expect(report.warnings[0]).toMatchObject({
        operation: 'bind',
        source_category_id: 1,
        attribute_id: 10,
        category_id: 2,
        message: 'Injected insert failure at category 2',
      });
      expect(db.liveRow(2, 10)).toBeUndefined();
      expect(db.liveRow(3, 10)).toBeDefined();
      expect(db.liveRow(4, 10)).toBeDefined();
      expect(log.warn).toHaveBeenCalledWith(
        '[Cascade] bind step failed',
        expect.objectContaining({ categoryId: 2, attributeId: 10, sourceCategoryId: 1 })
      );
    });

    it('aborts as a whole when the subtree cannot be walked', async () => {
      db.addCategory(5).addCategory(6, 5).setParent(5, 6);
      await bindDirect(5);

      const report = await engine.cascadeBind(5, 10, false, 0);

      expect(report).toMatchObject({ applied: 0, skipped: 0, failed: 0, aborted: true });
      expect(report.warnings.map((warning) => [warning.category_id, warning.message])).toEqual([
        [null, 'Category 5 is part of a parent cycle'],
      ]);
      expect(db.liveRow(6, 10)).toBeUndefined();
    });

    it('stays quiet for a leaf category', async () => {
      await bindDirect(4);

      const report = await engine.cascadeBind(4, 10, false, 0);

      expect(report.total_descendants).toBe(0);
      expect(log.info).not.toHaveBeenCalled();
    });
  });

  describe('cascadeUnbind', () => {
    it('removes copies that came from the unbound category', async () => {
      await bindDirect(1);
      await engine.cascadeBind(1, 10, false, 0);

      const report = await engine.cascadeUnbind(1, 10);

      expect(report).toMatchObject({ total_descendants: 3, applied: 3, skipped: 0 });
      expect(db.liveRow(2, 10)).toBeUndefined();
      expect(db.liveRow(4, 10)).toBeUndefined();
    });

    it('keeps direct bindings and copies from other categories', async () => {
      await bindDirect(1);
      await bindDirect(2, true);
      await copyFrom(3, 1);
      await copyFrom(4, 2);

      const report = await engine.cascadeUnbind(1, 10);

      expect(report).toMatchObject({ applied: 1, skipped: 2 });
      expect(db.liveRow(2, 10)).toMatchObject({ inherited_from_category_id: null });
      expect(db.liveRow(3, 10)).toBeUndefined();
      expect(db.liveRow(4, 10)).toMatchObject({ inherited_from_category_id: 2 });
    });
  });

  describe('cascadeUpdate', () => {
    it('updates copies from the source but not overriding descendants', async () => {
      await bindDirect(1);
      await engine.cascadeBind(1, 10, false, 0);
      // category 3 overrides its copy with its own binding
      await new CategoryAttributeStore(db).bind(3, 10, false, 0);

      const report = await engine.cascadeUpdate(1, 10, { is_required: true });

      expect(report).toMatchObject({ applied: 2, skipped: 1 });
      expect(db.liveRow(2, 10)).toMatchObject({ is_required: true, sort: 0 });
      expect(db.liveRow(3, 10)).toMatchObject({ is_required: false });
      expect(db.liveRow(4, 10)).toMatchObject({ is_required: true });
    });

    it('does nothing for an empty patch', async () => {
      await bindDirect(1);
      await engine.cascadeBind(1, 10, false, 0);
      const before = db.transactionCount;

      const report = await engine.cascadeUpdate(1, 10, {});

      expect(report).toMatchObject({ total_descendants: 0, applied: 0, skipped: 0, failed: 0 });
      expect(db.transactionCount).toBe(before);
    });
  });

  describe('isAttributeInheritedFromParent', () => {
    it('accepts a copy whose provenance is a strict ancestor', async () => {
      await bindDirect(1);
      await copyFrom(4, 1);

      expect(await engine.isAttributeInheritedFromParent(4, 10, 1)).toBe(true);
    });

    it('rejects a copy shadowed by a direct binding in between', async () => {
      await bindDirect(1);
      await bindDirect(2);
      await copyFrom(4, 1);

      expect(await engine.isAttributeInheritedFromParent(4, 10, 1)).toBe(false);
    });

    it('rejects provenance that is not an ancestor', async () => {
      await copyFrom(3, 2);

      expect(await engine.isAttributeInheritedFromParent(3, 10, 2)).toBe(false);
    });

    it('rejects a direct binding', async () => {
      await bindDirect(2);

      expect(await engine.isAttributeInheritedFromParent(2, 10, 1)).toBe(false);
    });
  });
});
