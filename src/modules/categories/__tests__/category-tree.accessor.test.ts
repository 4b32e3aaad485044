import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryDatabase } from '../../../__tests__/memory-database';
import { CategoryCycleError, CategoryDepthError, NotFoundError } from '../../../utils/errors';
import { CategoryTreeAccessor } from '../category-tree.accessor';

//      1
//    2   3
//   4 5
//   6
const buildTree = (maxDepth?: number) =>
  new MemoryDatabase({ maxDepth })
    .addCategory(1)
    .addCategory(2, 1)
    .addCategory(3, 1)
    .addCategory(4, 2)
    .addCategory(5, 2)
    .addCategory(6, 4);

describe('CategoryTreeAccessor', () => {
  let db: MemoryDatabase;
  let tree: CategoryTreeAccessor;

  beforeEach(() => {
    db = buildTree();
    tree = new CategoryTreeAccessor(db.categories);
  });

  it('returns the ancestor path root first', async () => {
    const path = await tree.getAncestorPath(6);

    expect(path.map((category) => category.id)).toEqual([1, 2, 4, 6]);
    expect(path.map((category) => category.level)).toEqual([1, 2, 3, 4]);
  });

  it('returns a single-element path for a root', async () => {
    const path = await tree.getAncestorPath(1);
    expect(path).toEqual([{ id: 1, parent_id: null, level: 1 }]);
  });

  it('lists descendants level by level, excluding the category itself', async () => {
    expect(await tree.getAllDescendants(1)).toEqual([2, 3, 4, 5, 6]);
    expect(await tree.getAllDescendants(2)).toEqual([4, 5, 6]);
    expect(await tree.getAllDescendants(6)).toEqual([]);
  });

  it('lists direct children only', async () => {
    const children = await tree.getChildren(2);
    expect(children.map((category) => category.id)).toEqual([4, 5]);
  });

  it('skips soft-deleted categories and their subtrees', async () => {
    db.deleteCategory(4);

    expect(await tree.getAllDescendants(2)).toEqual([5]);
    await expect(tree.getCategory(4)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('raises NotFoundError for a missing category', async () => {
    await expect(tree.getCategory(99)).rejects.toThrow('Category 99 not found');
    await expect(tree.getChildren(99)).rejects.toBeInstanceOf(NotFoundError);
    await expect(tree.getAllDescendants(99)).rejects.toBeInstanceOf(NotFoundError);
    await expect(tree.getAncestorPath(99)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('detects a parent cycle instead of looping', async () => {
    db.setParent(1, 6);

    await expect(tree.getAncestorPath(6)).rejects.toBeInstanceOf(CategoryCycleError);
    await expect(tree.getAllDescendants(2)).rejects.toBeInstanceOf(CategoryCycleError);
  });

  it('refuses to walk past the depth limit instead of cutting the result short', async () => {
    const shallow = new CategoryTreeAccessor(buildTree(2).categories);

    await expect(shallow.getAncestorPath(6)).rejects.toThrow(
      new CategoryDepthError(1, 2).message
    );
    await expect(shallow.getAllDescendants(1)).rejects.toBeInstanceOf(CategoryDepthError);
    await expect(shallow.getAllDescendants(1)).rejects.toMatchObject({ categoryId: 6, maxDepth: 2 });
    expect((await shallow.getAncestorPath(4)).map((category) => category.id)).toEqual([1, 2, 4]);
    expect(await shallow.getAllDescendants(2)).toEqual([4, 5, 6]);
  });

  it('lists every category parents first', async () => {
    expect(await tree.listCategoryIds()).toEqual([1, 2, 3, 4, 5, 6]);
  });
});
