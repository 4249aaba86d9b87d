import { getSettings } from "./smtp";

describe("smtp settings", () => {
  it("defaults to the local relay", () => {
    expect(getSettings({})).toEqual({ server: "localhost", port: 25 });
  });

  it("can be configured from the environment", () => {
    expect(
      getSettings({
        ZBACKUP_SMTP_HOST: "mail.example.com",
        ZBACKUP_SMTP_PORT: "587",
      }),
    ).toEqual({ server: "mail.example.com", port: 587 });
  });
});
