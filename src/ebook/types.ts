export interface ComicInfo {
  title: string;
  chapters: Chapter[];
}

export interface Chapter {
  id: string;
  title: string;
  dirName: string;
  imageCount: number;
  /** 1-based page number of the chapter's first image across the whole comic. */
  startPage: number;
}

/** Shape of `comic.json`. */
export interface ComicJson {
  title: string;
  chapters: {
    id: string;
    title: string;
    dir_name: string;
    image_count: number;
    start_page: number;
  }[];
}
