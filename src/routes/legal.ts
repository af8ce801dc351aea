import { Hono } from "hono";

// Public pages shown in the app footer
export const legalRoutes = new Hono();

const LAST_UPDATED = "2025-01-01";

legalRoutes.get("/privacy-policy", (c) =>
  c.json({
    title: "Privacy Policy",
    last_updated: LAST_UPDATED,
    content: [
      {
        section: "1. Data collection",
        text: "We only collect the data required to provide the quiz service: your username, email address and the quizzes you create.",
      },
      {
        section: "2. Use of data",
        text: "Your data is used exclusively to provide the service. Submitted video audio is transcribed and deleted right after your quiz is generated.",
      },
      {
        section: "3. Storage",
        text: "Data is stored in our database and transmitted over encrypted connections.",
      },
      {
        section: "4. Your rights",
        text: "You may request access to, correction of, and deletion of your personal data at any time.",
      },
    ],
  })
);

legalRoutes.get("/legal-notice", (c) =>
  c.json({
    title: "Legal Notice",
    operator: {
      name: process.env.OPERATOR_NAME || "",
      address: process.env.OPERATOR_ADDRESS || "",
      email: process.env.OPERATOR_EMAIL || "",
    },
    disclaimer:
      "The content of this service was created with great care. Quizzes are generated automatically, so we cannot guarantee that every question and answer is correct.",
    last_updated: LAST_UPDATED,
  })
);
