/** Subset of the Microsoft Graph `user` resource that the sync reads. */
export interface DirectoryUser {
  id: string;
  userPrincipalName?: string | null;
  displayName?: string | null;
  givenName?: string | null;
  surname?: string | null;
  jobTitle?: string | null;
  department?: string | null;
  officeLocation?: string | null;
  mail?: string | null;
  businessPhones?: string[] | null;
  mobilePhone?: string | null;
  streetAddress?: string | null;
  city?: string | null;
  state?: string | null;
  postalCode?: string | null;
  country?: string | null;
  countryLetterCode?: string | null;
}

/** Writable fields accepted by `PATCH /users/{id}`. */
export interface DirectoryUserUpdate {
  givenName?: string;
  surname?: string;
  displayName?: string;
  jobTitle?: string;
  department?: string;
  officeLocation?: string;
  mobilePhone?: string;
  businessPhones?: string[];
  streetAddress?: string;
  city?: string;
  state?: string;
  postalCode?: string;
  country?: string;
}

export interface DirectoryClient {
  getAllUsers(): Promise<DirectoryUser[]>;
  getUser(userId: string): Promise<DirectoryUser>;
  updateUser(userId: string, update: DirectoryUserUpdate): Promise<DirectoryUser>;
}

export interface SyncStats {
  totalDirectoryUsers: number;
  organizationUsers: number;
  processed: number;
  created: number;
  updated: number;
  errors: number;
  countriesCreated: number;
  startedAt: Date;
  finishedAt: Date | null;
}
