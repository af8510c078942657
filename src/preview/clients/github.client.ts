import axios, { AxiosInstance } from "axios";

export const DEFAULT_GITHUB_API_URL = "https://api.github.com";

/**
 * Posts status to a pull request thread. Implementations may throw; callers
 * treat a failed post as a warning.
 */
export interface Notifier {
  postComment(
    repoOwner: string,
    repoName: string,
    issueNumber: number,
    text: string
  ): Promise<void>;
}

export type GithubClientOptions = Readonly<{
  token: string;
  apiUrl?: string;
  http?: AxiosInstance;
}>;

export class GithubClient implements Notifier {
  private readonly http: AxiosInstance;
  private readonly apiUrl: string;
  private readonly token: string;

  constructor(options: GithubClientOptions) {
    this.http = options.http ?? axios.create({ timeout: 10_000 });
    this.apiUrl = (options.apiUrl ?? DEFAULT_GITHUB_API_URL).replace(/\/+$/, "");
    this.token = options.token;
  }

  async postComment(
    repoOwner: string,
    repoName: string,
    issueNumber: number,
    text: string
  ): Promise<void> {
    const url = `${this.apiUrl}/repos/${encodeURIComponent(
      repoOwner
    )}/${encodeURIComponent(repoName)}/issues/${issueNumber}/comments`;

    const headers = {
      Accept: "application/vnd.github+json",
      Authorization: `Bearer ${this.token}`,
      "X-GitHub-Api-Version": "2022-11-28",
    };

    await this.http.post(url, { body: text }, { headers });
  }
}
