export interface Commit {
  readonly authorName: string;
  readonly authorEmail: string;
  readonly committerName: string;
  readonly committerEmail: string;
}

export interface Identity {
  readonly name: string;
  readonly email: string;
}

export interface ExtractionOptions {
  readonly checkByCommitter: boolean;
}
