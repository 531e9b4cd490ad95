import {
  ConsoleObservability,
  CustomObjectSchemaManager,
  DropdownField,
  IntegerField,
  LookupField,
  NameField,
  TextField,
  UniqueConstraintError,
  ZendeskClient,
  defineCustomObject,
} from "../src/index.js";

async function main() {
  // Reads ZENDESK_SUBDOMAIN, ZENDESK_EMAIL and ZENDESK_API_TOKEN (or .env)
  const client = ZendeskClient.fromEnv({
    observability: new ConsoleObservability({ pretty: true }),
  });

  const Book = defineCustomObject(
    {
      title: "Book",
      name: new NameField({ unique: true }),
      fields: {
        author: new TextField(),
        pages: new IntegerField(),
        genre: new DropdownField({ choices: ["Science fiction", "Poetry", "History"] }),
        requester: new LookupField({ target: "zen:user" }),
      },
    },
    { client }
  );

  const schema = new CustomObjectSchemaManager(client);
  const [, created] = await schema.getOrCreateCustomObjectFromModel(Book);
  console.log(created ? "Custom object created." : "Custom object already exists.");

  for (const drift of await schema.detectDrift(Book)) {
    console.warn(`${drift.severity} ${drift.type} on '${drift.field}'`);
  }

  try {
    const dune = await Book.objects.create({ name: "Dune", author: "Frank Herbert", pages: 412, genre: "science_fiction" });
    console.log("Created", dune.id);
  } catch (error) {
    if (!(error instanceof UniqueConstraintError)) {
      throw error;
    }
    console.log(`A book named '${String(error.value)}' already exists.`);
  }

  const long = await Book.objects.filter({ pages: { $gte: 300 } }, { orderBy: "-pages" });
  console.log("Long books:", long.map((book) => book.name));

  const dune = await Book.objects.get({ name: "Dune" });
  dune.set("pages", 896);
  await dune.save();

  console.log("Books:", await Book.objects.count());
}

main().catch(console.error);
