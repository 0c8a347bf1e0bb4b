export interface Bookmark {
  readonly name: string;
  readonly server: string;
  readonly url: string;
  // seconds since epoch, refreshed on update
  readonly timestamp: number;
}

export interface BookmarkUpdate {
  name?: string;
  url?: string;
}
