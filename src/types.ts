/** login => RFC 3339 UTC timestamps of the login's external commits, in discovery order */
export type ContributionRecord = Record<string, string[]>;

export type FilterSet = {
  emails: ReadonlySet<string>;
  names: ReadonlySet<string>;
  blocklist: ReadonlySet<string>;
  internalDomain: string; // e.g. "@cockroachlabs.com"
};

export type Identity = {
  login: string;
  name?: string;
  url?: string;
};

export type EnrichedUser = Required<Identity> & {
  times: Date[];
};

/** exclusive on both ends: `from < t < to` */
export type TimeRange = {
  from: Date;
  to: Date;
};
