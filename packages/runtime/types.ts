export interface AuthorRef {
  id: number;
  username: string;
}

export interface PostSummary {
  id: number;
  slug: string;
  title: string;
  author: AuthorRef;
  is_published: boolean;
  created_at: string;
}

export interface CommentView {
  id: number;
  post: number;
  author: AuthorRef;
  body: string;
  is_approved: boolean;
}

export interface PostDetail extends PostSummary {
  body: string;
  comments: CommentView[];
}

export interface PostCreated {
  url: string;
  message: string;
}

export interface PostUpdated {
  message: string;
}
