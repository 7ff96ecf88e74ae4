export default {
  serviceAccountId: "onboarding-provisioner",
  defaultSpaces: ["spaces/ANNOUNCEMENTS"],
  logLevel: "info",
  retry: {
    maxRetries: 5,
    initialDelayMs: 1_000,
    exponentialBase: 7,
    retryableStatuses: [429, 500, 503, 504],
  },
  roster: {
    "PROJ-ALPHA": [
      { email: "maria.rosa@enterprise.com", role: "Contributor", status: "Active" },
      { email: "dev.lead@enterprise.com", role: "Lead", status: "Active" },
      { email: "former.member@enterprise.com", role: "Contributor", status: "Inactive" },
    ],
    "PROJ-BETA": [
      { email: "maria.rosa@enterprise.com", role: "Reviewer", status: "Active" },
    ],
  },
};
