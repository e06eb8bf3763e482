import { NotFound } from '../errors.js';
import { authorize, canAccess, type Resource, type WriteAction } from '../policy/access.js';
import { callerLabel, isStaff, requireIdentity, type Caller } from '../policy/caller.js';
import { postPatchSchema, postWriteSchema, validate } from '../schemas.js';
import { postUrl, slugify } from '../slug.js';
import type { PostRecord } from '../store/index.js';
import type { PostCreated, PostDetail, PostSummary, PostUpdated } from '../types.js';
import type { ControllerContext, UpdateOptions } from './context.js';

const POST: Resource = { type: 'post' };

export class PostsController {
  constructor(private readonly ctx: ControllerContext) {}

  async list(caller: Caller): Promise<PostSummary[]> {
    return this.ctx.store.posts.listVisible(caller);
  }

  async retrieve(caller: Caller, id: number): Promise<PostDetail> {
    const post = await this.findVisible(caller, id);
    const comments = await this.ctx.store.comments.listForPost(post.id);
    return { ...post, comments };
  }

  async create(caller: Caller, input: unknown): Promise<PostCreated> {
    this.guard(caller, 'create');
    const author = requireIdentity(caller);
    const fields = validate(postWriteSchema, input);

    const slug = fields.slug ?? slugify(fields.title);
    const isPublished = isStaff(caller) ? fields.is_published ?? false : false;
    const now = this.ctx.now ?? (() => new Date());

    const id = await this.ctx.store.transaction(async tx => {
      await tx.users.upsert({ id: author.id, username: author.username });
      const postId = await tx.posts.insert({
        slug,
        title: fields.title,
        body: fields.body,
        authorId: author.id,
        isPublished,
        createdAt: now().toISOString(),
      });
      await this.ctx.audit.record('post.create', { userId: author.id, model: 'post', data: { id: postId } }, tx.db);
      return postId;
    });

    this.ctx.logger.info({ postId: id, caller: callerLabel(caller) }, 'Post created');
    return { url: postUrl(slug, id), message: 'Post created successfully.' };
  }

  async update(caller: Caller, id: number, input: unknown, options: UpdateOptions): Promise<PostUpdated> {
    await this.findVisible(caller, id);
    this.guard(caller, 'update');
    const actor = requireIdentity(caller);
    const fields = options.partial ? validate(postPatchSchema, input) : validate(postWriteSchema, input);

    await this.ctx.store.transaction(async tx => {
      await tx.posts.update(id, fields);
      await this.ctx.audit.record(
        'post.update',
        { userId: actor.id, model: 'post', data: { id, fields: Object.keys(fields) } },
        tx.db,
      );
    });
    this.ctx.logger.info({ postId: id, caller: callerLabel(caller) }, 'Post updated');
    return { message: 'Post updated successfully.' };
  }

  async delete(caller: Caller, id: number): Promise<void> {
    await this.findVisible(caller, id);
    this.guard(caller, 'delete');
    const actor = requireIdentity(caller);

    await this.ctx.store.transaction(async tx => {
      await tx.posts.delete(id);
      await this.ctx.audit.record('post.delete', { userId: actor.id, model: 'post', data: { id } }, tx.db);
    });
    this.ctx.logger.info({ postId: id, caller: callerLabel(caller) }, 'Post deleted');
  }

  // Posts outside the caller's visible set do not exist as far as they can tell.
  private async findVisible(caller: Caller, id: number): Promise<PostRecord> {
    const post = await this.ctx.store.posts.findVisible(caller, id);
    if (!post) {
      throw new NotFound();
    }
    return post;
  }

  private guard(caller: Caller, action: WriteAction): void {
    if (!canAccess(caller, POST, action)) {
      this.ctx.logger.warn({ caller: callerLabel(caller), action }, 'Post access denied');
    }
    authorize(caller, POST, action);
  }
}
